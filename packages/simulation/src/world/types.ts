export type AgentId = string;

export interface Point {
  x: number;
  y: number;
}

export type Attribute = "Prowess" | "Logic" | "Influence" | "Resolve";

export type Skill =
  | "Melee"
  | "Firearms"
  | "Pilot"
  | "Repair"
  | "Medicine"
  | "Persuasion"
  | "Empathy"
  | "Observation"
  | "Comms"
  | "Deception"
  | "Stealth";

export type TrueNature = "Human" | "Infected";
export type InfectionState = "Human" | "InfectedMasked" | "Revealed";
export type Posture = "Standing" | "Crouching" | "Crawling" | "Hiding";
export type CoverLevel = "None" | "Light" | "Heavy" | "Full";

export type BehaviorMode =
  | "Scheduled"
  | "Wandering"
  | "Fleeing"
  | "Frozen"
  | "Searching"
  | "Pursuing"
  | "Flanking"
  | "Hunting"
  | "Lynching";

export interface ScheduleEntry {
  /** Hour the window opens, 0-23. */
  start: number;
  /** Hour the window closes (exclusive). A window with end <= start wraps past midnight. */
  end: number;
  room: string;
}

export interface AgentBehavior {
  mode: BehaviorMode;
  targetId: AgentId | null;
  waypoint: Point | null;
  turnsRemaining: number;
}

export interface Agent {
  id: AgentId;
  name: string;
  role: string;
  isPlayer: boolean;
  position: Point;
  health: number;
  maxHealth: number;
  alive: boolean;
  trueNature: TrueNature;
  disguiseIntegrity: number;
  revealed: boolean;
  attributes: Record<Attribute, number>;
  skills: Partial<Record<Skill, number>>;
  stress: number;
  posture: Posture;
  cover: CoverLevel;
  noise: number;
  restrained: boolean;
  schedule: ScheduleEntry[];
  habitat: string[];
  inventory: string[];
  knowledgeTags: string[];
  behavior: AgentBehavior;
}

export type RoomFlag = "backupPower" | "heated" | "radio" | "generator" | "infirmary";

export interface RoomDefinition {
  id: string;
  name: string;
  glyph: string;
  flags: RoomFlag[];
  /** Inclusive bounding box of the room's cells. */
  bounds: { x1: number; y1: number; x2: number; y2: number };
  anchor: Point;
}

export interface RoomState {
  dark: boolean;
  frozen: boolean;
  barricade: number;
  bloody: boolean;
  destroyed: boolean;
  items: string[];
}

export interface EnvironmentState {
  temperature: number;
  powerOn: boolean;
  powerRestoreCountdown: number;
  stormIntensity: number;
  windChill: number;
  northeasterlyTurns: number;
  radioOperational: boolean;
  bloodBankIntact: boolean;
}

export interface CraftJob {
  agentId: AgentId;
  recipeId: string;
  turnsRemaining: number;
}

export interface JobState {
  crafting: CraftJob[];
  /** Turns until the rescue team lands; null until an SOS goes out. */
  rescueCountdown: number | null;
  rescueArrived: boolean;
}

export interface AiState {
  alertTurns: number;
  /** observer->subject pair key mapped to the first turn the pair may be rolled again. */
  detectionCooldowns: Map<string, number>;
}

export type EndingKind = "PlayerKilled" | "PlayerAssimilated" | "StationCleansed" | "Rescued";

export interface GameOutcome {
  ending: EndingKind;
  victory: boolean;
  turn: number;
}

export interface ItemDefinition {
  name: string;
  damage: number;
  skill?: Skill;
  /** Present only on items that can be thrown; the noise they make on landing. */
  throwNoise?: number;
}

export type Facing = "N" | "S" | "E" | "W";

interface DeviceBase {
  id: string;
  room: string;
  position: Point;
}

export type DeviceDefinition =
  | (DeviceBase & { kind: "camera"; facing: Facing; range: number })
  | (DeviceBase & { kind: "motionSensor" });

export interface SecurityLogEntry {
  turn: number;
  deviceId: string;
  agentId: AgentId;
  position: Point;
  read: boolean;
}

export interface SecurityState {
  /** Sabotaged device id mapped to the turns until it comes back online. */
  disabled: Map<string, number>;
  log: SecurityLogEntry[];
}

export interface StationEventState {
  /** Event id mapped to the turns before it may fire again. */
  cooldowns: Map<string, number>;
}
