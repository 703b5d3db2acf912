import type {
  AgentId,
  CoverLevel,
  EndingKind,
  Point,
  Posture,
  SecurityLogEntry,
} from "./world/types.js";

export type ErrorKind =
  | "InvalidTarget"
  | "PreconditionFailed"
  | "IllegalTransition"
  | "ResourceExhausted";

export type RevealReason = "MaskDepleted" | "CriticalWound" | "BloodTest";
export type PanicEffect = "DropItem" | "Freeze" | "Scream" | "Flee" | "LashOut";
export type InterrogationResponse = "Honest" | "Evasive" | "Hostile";
export type SabotageTarget = "power" | "radio" | "bloodBank";
export type RoomCondition = "dark" | "frozen" | "bloody";

export type TrustCause =
  | "evidence"
  | "failedAccusation"
  | "accusationVote"
  | "interrogation"
  | "lashOut"
  | "biologicalSlip";

export type PowerCause = "sabotage" | "restored" | "repaired" | "failure";
export type StationEventCategory = "weather" | "equipment" | "discovery" | "atmosphere" | "creature";
export type SecurityReport = Omit<SecurityLogEntry, "read">;

export type StressCause = "cold" | "isolation" | "recovery" | "panicCascade" | "psychicTremor";

export type ActionKind = Action["kind"];

export type Action =
  | { kind: "wait" }
  | { kind: "move"; dx: number; dy: number }
  | { kind: "posture"; posture: Posture }
  | { kind: "takeCover"; cover: CoverLevel }
  | { kind: "pickUp"; item: string }
  | { kind: "drop"; item: string }
  | { kind: "attack"; targetId: AgentId }
  | { kind: "bloodTest"; targetId: AgentId }
  | { kind: "tagEvidence"; targetId: AgentId }
  | { kind: "interrogate"; targetId: AgentId }
  | { kind: "accuse"; targetId: AgentId }
  | { kind: "assimilate"; targetId: AgentId }
  | { kind: "craft"; recipeId: string }
  | { kind: "cancelCraft" }
  | { kind: "sendSos" }
  | { kind: "barricade" }
  | { kind: "breakBarricade"; roomId: string }
  | { kind: "restorePower" }
  | { kind: "throw"; item: string; dx: number; dy: number }
  | { kind: "sabotageDevice"; deviceId: string }
  | { kind: "checkConsole" };

/** Payload of every event kind the simulation publishes. */
export interface EventPayloads {
  TurnAdvance: { turn: number; hour: number };
  ActionRejected: { agentId: AgentId; action: ActionKind; error: ErrorKind; reason: string };

  Movement: { agentId: AgentId; from: Point; to: Point; fromLocation: string; toLocation: string };
  PostureChanged: { agentId: AgentId; posture: Posture };
  CoverTaken: { agentId: AgentId; cover: CoverLevel };
  ItemPickedUp: { agentId: AgentId; item: string; roomId: string };
  ItemDropped: { agentId: AgentId; item: string; roomId: string };

  TemperatureChange: { temperature: number; effectiveTemperature: number; delta: number };
  WeatherChange: { stormIntensity: number; windChill: number; northeasterly: boolean };
  PowerChange: { powerOn: boolean; cause: PowerCause };
  RoomStateChange: { roomId: string; condition: RoomCondition; active: boolean };
  BarricadeChange: { agentId: AgentId; roomId: string; strength: number };
  Sabotage: { agentId: AgentId; target: SabotageTarget };
  StationEvent: { eventId: string; name: string; category: StationEventCategory };
  SuppliesFound: { roomId: string; item: string };

  Distraction: { agentId: AgentId; item: string; landing: Point; location: string; noise: number };
  SecurityDetection: {
    deviceId: string;
    kind: "camera" | "motionSensor";
    roomId: string;
    agentId: AgentId;
    position: Point;
  };
  DeviceSabotaged: { agentId: AgentId; deviceId: string; turns: number };
  DeviceRestored: { deviceId: string };
  ConsoleReviewed: { agentId: AgentId; entries: SecurityReport[] };

  Communion: { sourceId: AgentId; targetId: AgentId; location: string; probability: number };
  Assimilation: { actorId: AgentId; targetId: AgentId; location: string; knowledge: string[] };
  MaskDecay: { agentId: AgentId; amount: number; integrity: number };
  BiologicalSlip: { agentId: AgentId; tell: string };
  Reveal: { agentId: AgentId; reasons: RevealReason[] };
  BloodTest: { testerId: AgentId; subjectId: AgentId; positive: boolean };

  Initiative: { attackerId: AgentId; defenderId: AgentId; attackerRoll: number; defenderRoll: number; firstId: AgentId };
  CombatLog: {
    strikerId: AgentId;
    targetId: AgentId;
    hit: boolean;
    blocked: boolean;
    attackSuccesses: number;
    defenseSuccesses: number;
    damage: number;
    targetHealth: number;
  };
  AgentDeath: { agentId: AgentId; killerId: AgentId | null; location: string };

  DetectionReport: { observerId: AgentId; subjectId: AgentId; detected: boolean; probability: number };
  AlertBroadcast: { sourceId: AgentId; targetId: AgentId; recipients: AgentId[]; entryPoints: Point[] };
  StationAlert: { observerId: AgentId; subjectId: AgentId; turns: number };

  ParanoiaThreshold: { threshold: number; direction: "up" | "down"; paranoia: number };
  StressChange: { agentId: AgentId; delta: number; stress: number; cause: StressCause };
  PanicReport: { agentId: AgentId; effect: PanicEffect; victimId: AgentId | null };

  TrustChange: { observerId: AgentId; subjectId: AgentId; delta: number; trust: number; cause: TrustCause };
  EvidenceTagged: { taggerId: AgentId; subjectId: AgentId };
  Interrogation: { interrogatorId: AgentId; subjectId: AgentId; response: InterrogationResponse };
  Accusation: {
    accuserId: AgentId;
    accusedId: AgentId;
    supporters: AgentId[];
    opposers: AgentId[];
    upheld: boolean;
  };
  LynchMobTrigger: { targetId: AgentId; meanTrust: number };

  CraftQueued: { agentId: AgentId; recipeId: string; turns: number };
  CraftCompleted: { agentId: AgentId; recipeId: string; item: string };
  CraftCancelled: { agentId: AgentId; recipeId: string; reason: "cancelled" | "missingIngredients" | "agentLost" };
  SosSent: { agentId: AgentId; turnsUntilRescue: number };
  RescueArrived: { turn: number };

  GameOver: { ending: EndingKind; victory: boolean };
}

export type EventType = keyof EventPayloads;

/** Immutable record of something that happened, tagged by `type`. */
export type SimulationEvent = {
  [K in EventType]: {
    readonly type: K;
    readonly turn: number;
    readonly seq: number;
    readonly payload: EventPayloads[K];
  };
}[EventType];

/** An event before the bus stamps it with a turn and sequence number. */
export type EventDraft = {
  [K in EventType]: { type: K; payload: EventPayloads[K] };
}[EventType];

export type EventOf<K extends EventType> = Extract<SimulationEvent, { type: K }>;

export interface ActionResult {
  accepted: boolean;
  events: SimulationEvent[];
  error?: ErrorKind;
  reason?: string;
}
