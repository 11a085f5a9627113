/**
 * doorsync Panel Runtime
 *
 * Public entry point. Wires the session, command client, door directory,
 * event stream, normalizer, state store, schedule cache and dispatcher
 * together:
 *
 *   push frames → normalizer → state store → dispatcher → listeners
 *   commands → panel → optimistic state store update → dispatcher
 *
 * A broken event stream leaves commands working; the connection state is
 * published under the `connection` key.
 */

import {
  ConnectionState,
  LockState,
  OverrideType,
  ReaderMode,
  type ActionPlan,
  type CommandOutcome,
  type Door,
  type OtrSchedule,
  type OverrideState,
  type Partition,
  type PanelEvent,
  type Reader,
  type Session,
  type TempCode,
} from '@doorsync/core';
import {
  CommandClient,
  type OtrScheduleInput,
  type OverrideOutcome,
  type OverrideRequest,
  type TempCodeInput,
  type TempCodeWindow,
} from './command-client.js';
import { loadConfig, type LoadConfigOptions, type RuntimeConfig } from './config.js';
import { Dispatcher, entityKey, type Listener, type Unsubscribe } from './dispatcher.js';
import { DoorDirectory } from './door-directory.js';
import { ValidationError, createLogger, errorMessage, type Logger } from './edge-logger.js';
import { EventNormalizer } from './event-normalizer.js';
import { EventStream, type HubSocketFactory } from './event-stream.js';
import { ScheduleCache } from './schedule-cache.js';
import { SessionManager } from './session-manager.js';
import { DoorStateStore } from './state-store.js';

// ============================================================================
// Types
// ============================================================================

export type RuntimeNotification =
  | { type: 'door'; door: Readonly<Door> }
  | { type: 'temp-codes'; doorId: number; codes: readonly TempCode[] }
  | { type: 'otr-schedules'; schedules: readonly OtrSchedule[] }
  | { type: 'connection'; state: ConnectionState; detail?: string };

export interface PanelRuntimeConfig
  extends Pick<RuntimeConfig, 'baseUrl' | 'username' | 'password' | 'partitionId'>,
    Partial<Omit<RuntimeConfig, 'baseUrl' | 'username' | 'password' | 'partitionId'>> {
  /** Run the door log plan after pulses and unlock overrides. Default: false */
  logCommands?: boolean;
  /** Name written by the door log plan. Default: 'doorsync' */
  appName?: string;
  socketFactory?: HubSocketFactory;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

export interface DiscoveryResult {
  partition: Partition;
  doors: Readonly<Door>[];
  readers: Reader[];
  plans: ActionPlan[];
}

export interface Credentials {
  username: string;
  password: string;
}

// ============================================================================
// PanelRuntime
// ============================================================================

export class PanelRuntime {
  private readonly partitionId: number;
  private readonly logCommands: boolean;
  private readonly appName: string;
  private readonly now: () => number;
  private readonly log: Logger;

  private readonly session: SessionManager;
  private readonly commands: CommandClient;
  private readonly directory: DoorDirectory;
  private readonly normalizer: EventNormalizer;
  private readonly store: DoorStateStore;
  private readonly dispatcher: Dispatcher<RuntimeNotification>;
  private readonly cache: ScheduleCache;
  private readonly stream: EventStream;

  private discovered = false;
  private logPlanId: number | null = null;

  constructor(config: PanelRuntimeConfig) {
    this.partitionId = config.partitionId;
    this.logCommands = config.logCommands ?? false;
    this.appName = config.appName ?? 'doorsync';
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createLogger('panel-runtime');

    this.session = new SessionManager({
      baseUrl: config.baseUrl,
      username: config.username,
      password: config.password,
      timeoutMs: config.requestTimeoutMs,
      verifyTls: config.verifyTls,
      logger: config.logger,
    });
    this.commands = new CommandClient({
      session: this.session,
      partitionId: config.partitionId,
      defaultOverrideMinutes: config.defaultOverrideMinutes,
      now: () => new Date(this.now()),
      logger: config.logger,
    });
    this.directory = new DoorDirectory(this.commands, config.logger);
    this.normalizer = new EventNormalizer({
      directory: this.directory,
      dialect: config.dialect,
      logger: config.logger,
    });
    this.store = new DoorStateStore(config.partitionId);
    this.dispatcher = new Dispatcher<RuntimeNotification>(config.logger);

    this.cache = new ScheduleCache({
      source: this.commands,
      store: this.store,
      doorIds: () => this.directory.doorIds(),
      refreshMs: config.cacheRefreshMs,
      onTempCodes: (doorId, codes) =>
        this.dispatcher.publish(entityKey.tempCodes(doorId), { type: 'temp-codes', doorId, codes }),
      onOtrSchedules: (schedules) =>
        this.dispatcher.publish(entityKey.otrSchedules(), { type: 'otr-schedules', schedules }),
      logger: config.logger,
    });

    this.stream = new EventStream({
      session: this.session,
      directory: this.directory,
      normalizer: this.normalizer,
      statusSource: this.commands,
      onEvents: (events) => this.applyEvents(events),
      onDirectoryRefreshed: () => this.syncDoors(),
      verifyTls: config.verifyTls,
      reconnectBaseMs: config.reconnectBaseMs,
      reconnectMaxMs: config.reconnectMaxMs,
      snapshotIntervalMs: config.snapshotIntervalMs,
      socketFactory: config.socketFactory,
      random: config.random,
      now: this.now,
      logger: config.logger,
    });
    this.stream.onStateChange((state, detail) => {
      const notification: RuntimeNotification = { type: 'connection', state };
      if (detail !== undefined) notification.detail = detail;
      this.dispatcher.publish(entityKey.connection(), notification);
    });
  }

  // ---------- Lifecycle ----------

  /** Log in, optionally with new credentials. */
  async connect(credentials?: Credentials): Promise<Session> {
    if (credentials) {
      this.session.setCredentials(credentials.username, credentials.password);
    }
    await this.session.login();
    const session = this.session.getSession();
    if (!session) {
      throw new ValidationError('Login returned no session', 'session');
    }
    return session;
  }

  /** Read the partition's topology and seed the store. */
  async discover(partitionId = this.partitionId): Promise<DiscoveryResult> {
    if (partitionId !== this.partitionId) {
      throw new ValidationError(
        `Runtime is bound to partition ${this.partitionId}; got ${partitionId}`,
        'partitionId',
      );
    }

    try {
      const legend = await this.commands.getModeLegend();
      if (legend.size > 0) {
        this.commands.setModeLegend(legend);
        this.normalizer.setLegend(legend);
      }
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err) }, 'Mode legend unavailable; using built-in table');
    }

    const partitions = await this.commands.getPartitions();
    const partition = partitions.find((p) => p.id === partitionId) ?? {
      id: partitionId,
      name: `Partition ${partitionId}`,
    };

    await this.directory.refresh();
    this.syncDoors();

    const [readers, plans] = await Promise.all([
      this.commands.getAvailableReaders(),
      this.commands.getActionPlans(),
    ]);
    this.discovered = true;
    this.log.info(
      { partitionId, doors: this.directory.doorIds().length, readers: readers.length, plans: plans.length },
      'Discovery complete',
    );
    return { partition, doors: this.store.getDoors(), readers, plans };
  }

  /** Start the event stream and the schedule cache, discovering first when needed. */
  async start(): Promise<void> {
    if (!this.discovered) await this.discover();
    this.stream.start();
    this.cache.start();
    this.cache.refreshAll().catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'Initial schedule refresh failed');
    });
  }

  async stop(): Promise<void> {
    this.cache.stop();
    await this.stream.stop();
  }

  /** Stop and release the HTTP connection pool. */
  async close(): Promise<void> {
    await this.stop();
    this.dispatcher.clear();
    await this.session.close();
  }

  /** Forget every door and schedule. The next `start()` discovers again. */
  reset(): void {
    this.store.reset();
    this.discovered = false;
  }

  // ---------- Read side ----------

  subscribe(key: string, listener: Listener<RuntimeNotification>): Unsubscribe {
    return this.dispatcher.subscribe(key, listener);
  }

  connectionState(): ConnectionState {
    return this.stream.connectionState;
  }

  getDoor(doorId: number): Readonly<Door> | null {
    return this.store.getDoor(doorId);
  }

  getDoors(): Readonly<Door>[] {
    return this.store.getDoors();
  }

  getTempCodes(doorId: number): readonly TempCode[] {
    return this.store.getTempCodes(doorId);
  }

  getOtrSchedules(doorId?: number): readonly OtrSchedule[] {
    return this.store.getOtrSchedules(doorId);
  }

  refreshSchedules(): Promise<void> {
    return this.cache.refreshAll();
  }

  /** Poll every door's status now. */
  snapshot(): Promise<number> {
    return this.stream.snapshotNow();
  }

  // ---------- Door commands ----------

  async override(doorIds: number[], request: OverrideRequest): Promise<OverrideOutcome> {
    const observedAt = this.now();
    const outcome = await this.commands.override(doorIds, request);

    if (request.mode === ReaderMode.NONE) {
      this.applyResumed(outcome.succeeded, observedAt);
      return outcome;
    }

    const override: OverrideState = { type: request.type, mode: request.mode };
    if (request.type === OverrideType.TIMED && outcome.minutes !== undefined) {
      override.minutes = outcome.minutes;
      override.until = new Date(observedAt + outcome.minutes * 60_000).toISOString();
    }

    const events: PanelEvent[] = [];
    for (const doorId of outcome.succeeded) {
      events.push({
        kind: 'override',
        doorId,
        observedAt,
        source: 'command',
        overridden: true,
        readerMode: request.mode,
        override,
      });
      if (request.mode === ReaderMode.UNLOCK) {
        events.push({ kind: 'lock_state', doorId, observedAt, source: 'command', lockState: LockState.UNLOCKED });
      } else if (request.mode === ReaderMode.LOCKDOWN) {
        events.push({ kind: 'lock_state', doorId, observedAt, source: 'command', lockState: LockState.LOCKED });
      }
    }
    this.applyEvents(events);

    if (request.mode === ReaderMode.UNLOCK) await this.logCommand(outcome.succeeded);
    return outcome;
  }

  async resume(doorIds: number[]): Promise<CommandOutcome> {
    const observedAt = this.now();
    const outcome = await this.commands.resume(doorIds);
    this.applyResumed(outcome.succeeded, observedAt);
    return outcome;
  }

  async pulse(doorIds: number[]): Promise<CommandOutcome> {
    const outcome = await this.commands.pulse(doorIds);
    await this.logCommand(outcome.succeeded);
    return outcome;
  }

  async updatePanels(): Promise<void> {
    await this.commands.updatePanels();
  }

  async executePlan(planId: number, sessionVars?: Record<string, string>): Promise<void> {
    await this.commands.executePlan(planId, { sessionVars });
  }

  async executePlans(planIds: number[], sessionVars?: Record<string, string>): Promise<CommandOutcome> {
    return this.commands.executePlans(planIds, { sessionVars });
  }

  // ---------- Temp codes ----------

  async createTempCode(doorId: number, input: TempCodeInput): Promise<TempCode> {
    const code = await this.commands.createTempCode(doorId, input);
    await this.cache.refreshTempCodes(doorId);
    return code;
  }

  async updateTempCode(
    code: string,
    window: TempCodeWindow,
  ): Promise<{ userId: number; startTime: string | null; endTime: string | null }> {
    const doorId = this.doorForTempCode(code);
    const result = await this.commands.updateTempCode(code, window);
    await this.refreshTempCodesFor(doorId);
    return result;
  }

  async deleteTempCode(code: string): Promise<number> {
    const doorId = this.doorForTempCode(code);
    const userId = await this.commands.deleteTempCode(code);
    await this.refreshTempCodesFor(doorId);
    return userId;
  }

  // ---------- One-time-run schedules ----------

  async createOtrSchedule(input: OtrScheduleInput): Promise<OtrSchedule[]> {
    const schedules = await this.commands.createOtrSchedule(input);
    await this.cache.refreshOtrSchedules();
    return schedules;
  }

  async deleteOtrSchedule(scheduleId: number): Promise<void> {
    await this.commands.deleteOtrSchedule(scheduleId);
    await this.cache.refreshOtrSchedules();
  }

  // ---------- Internal helpers ----------

  private applyEvents(events: PanelEvent[]): void {
    for (const event of events) {
      const door = this.store.apply(event);
      if (door) this.dispatcher.publish(entityKey.door(door.id), { type: 'door', door });
    }
  }

  private applyResumed(doorIds: number[], observedAt: number): void {
    const events: PanelEvent[] = [];
    for (const doorId of doorIds) {
      const baseline = this.normalizer.baselineModeFor(doorId);
      events.push({
        kind: 'override',
        doorId,
        observedAt,
        source: 'command',
        overridden: false,
        readerMode: baseline,
        override: { type: null, mode: ReaderMode.NONE },
      });
      events.push({
        kind: 'lock_state',
        doorId,
        observedAt,
        source: 'command',
        lockState: baseline === ReaderMode.UNLOCK ? LockState.UNLOCKED : LockState.LOCKED,
      });
    }
    this.applyEvents(events);
  }

  /** Bring the store's door set in line with the directory. */
  private syncDoors(): void {
    const added = this.store.seedDoors(this.directory.doors());
    for (const doorId of added) {
      const door = this.store.getDoor(doorId);
      if (door) this.dispatcher.publish(entityKey.door(doorId), { type: 'door', door });
    }
  }

  private doorForTempCode(code: string): number | null {
    for (const doorId of this.directory.doorIds()) {
      if (this.store.getTempCodes(doorId).some((c) => c.code === code)) return doorId;
    }
    return null;
  }

  private async refreshTempCodesFor(doorId: number | null): Promise<void> {
    if (doorId !== null) {
      await this.cache.refreshTempCodes(doorId);
      return;
    }
    await this.cache.refreshAll();
  }

  /** Write "<app> unlocked <door>" to the panel log through the log plan. */
  private async logCommand(doorIds: number[]): Promise<void> {
    if (!this.logCommands || doorIds.length === 0) return;
    try {
      const planId = this.logPlanId ?? (await this.commands.ensureLogPlan());
      this.logPlanId = planId;
      for (const doorId of doorIds) {
        const name = this.store.getDoor(doorId)?.name ?? `Door ${doorId}`;
        await this.commands.executePlan(planId, { sessionVars: { App: this.appName, Door: name } });
      }
    } catch (err: unknown) {
      this.log.warn({ doorIds, err: errorMessage(err) }, 'Door log plan failed');
    }
  }
}

/** Build a runtime from DOORSYNC_* environment variables. */
export function createRuntimeFromEnv(
  options: LoadConfigOptions = {},
  extra: Omit<PanelRuntimeConfig, keyof RuntimeConfig> = {},
): PanelRuntime {
  return new PanelRuntime({ ...loadConfig(options), ...extra });
}
