import type { BalanceConfig } from "../balance-config.js";
import { SimulationError } from "../core/errors.js";
import type { StationMap } from "./station-map.js";
import { TrustMatrix } from "./trust-matrix.js";
import type {
  Agent,
  AgentId,
  AiState,
  EnvironmentState,
  GameOutcome,
  InfectionState,
  JobState,
  Point,
  SecurityState,
  StationEventState,
} from "./types.js";

/**
 * The owned aggregate of everything that changes during play. Systems receive
 * it through the simulation context and write only the parts they own.
 */
export class World {
  readonly map: StationMap;
  readonly trust: TrustMatrix;
  private agents = new Map<AgentId, Agent>();
  private _turn = 0;

  paranoia = 0;
  environment: EnvironmentState;
  ai: AiState = { alertTurns: 0, detectionCooldowns: new Map() };
  jobs: JobState = { crafting: [], rescueCountdown: null, rescueArrived: false };
  security: SecurityState = { disabled: new Map(), log: [] };
  stationEvents: StationEventState = { cooldowns: new Map() };
  outcome: GameOutcome | null = null;

  constructor(
    map: StationMap,
    private readonly config: BalanceConfig,
  ) {
    this.map = map;
    this.trust = new TrustMatrix(config.trust.initial);
    this.environment = {
      temperature: config.environment.startTemperature,
      powerOn: true,
      powerRestoreCountdown: 0,
      stormIntensity: 0,
      windChill: 0,
      northeasterlyTurns: 0,
      radioOperational: true,
      bloodBankIntact: true,
    };
  }

  get turn(): number {
    return this._turn;
  }

  /** Hour of day, starting from the configured hour at turn 0. */
  get hour(): number {
    return (this.config.environment.startHour + this._turn) % 24;
  }

  advanceTurn(): number {
    return ++this._turn;
  }

  setTurn(turn: number): void {
    this._turn = turn;
  }

  addAgent(agent: Agent): void {
    this.agents.set(agent.id, agent);
  }

  getAgent(id: AgentId): Agent | undefined {
    return this.agents.get(id);
  }

  requireAgent(id: AgentId): Agent {
    const agent = this.agents.get(id);
    if (!agent) throw new SimulationError("InvalidTarget", `unknown agent '${id}'`);
    return agent;
  }

  /** Every agent in roster order, dead ones included. */
  allAgents(): Agent[] {
    return [...this.agents.values()];
  }

  livingAgents(): Agent[] {
    return this.allAgents().filter((a) => a.alive);
  }

  player(): Agent | undefined {
    return this.allAgents().find((a) => a.isPlayer);
  }

  locationOf(agent: Agent): string {
    return this.map.locationKey(agent.position);
  }

  roomOf(agent: Agent): string | null {
    return this.map.roomAt(agent.position);
  }

  /** Living agents sharing a location key. */
  agentsAt(location: string): Agent[] {
    return this.livingAgents().filter((a) => this.locationOf(a) === location);
  }

  coLocated(a: Agent, b: Agent): boolean {
    return this.locationOf(a) === this.locationOf(b);
  }

  isDarkAt(p: Point): boolean {
    const room = this.map.roomAt(p);
    if (room === null) return !this.environment.powerOn;
    return this.map.roomState(room)?.dark ?? false;
  }

  effectiveTemperature(): number {
    const storm = this.environment.northeasterlyTurns > 0 ? this.config.environment.northeasterlyChill : 0;
    return this.environment.temperature + this.environment.windChill + storm;
  }

  infectionState(agent: Agent): InfectionState {
    if (agent.trueNature === "Human") return "Human";
    return agent.revealed ? "Revealed" : "InfectedMasked";
  }
}
