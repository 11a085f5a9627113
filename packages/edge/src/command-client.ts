/**
 * doorsync Command Client
 *
 * Typed wrappers for the panel's REST operations. Every call goes through the
 * Session Manager, so a stale cookie is renewed transparently. Commands that
 * take several doors are issued once per door and report a result per door.
 */

import { z } from 'zod';
import {
  OverrideType,
  ReaderMode,
  getReaderModeInfo,
  readerModeIndex,
  summarizeOutcome,
  type ActionPlan,
  type CommandOutcome,
  type ModeLegend,
  type OtrSchedule,
  type Partition,
  type Reader,
  type TargetResult,
  type TempCode,
} from '@doorsync/core';
import {
  RemoteRejection,
  ValidationError,
  createLogger,
  errorMessage,
  type Logger,
} from './edge-logger.js';
import { minutesUntil, parseUtc, toIsoUtc, toPanelTime } from './panel-time.js';
import {
  readBoolean,
  readNumber,
  readResult,
  readResults,
  readString,
  type JsonRecord,
} from './payload.js';
import type { SessionManager } from './session-manager.js';

// ============================================================================
// Types
// ============================================================================

export interface PanelDoor {
  id: number;
  name: string;
  partitionId: number | null;
  statusId: string | null;
}

export interface OverrideRequest {
  type: OverrideType;
  mode: ReaderMode;
  minutes?: number;
  /** End of a timed override. Converted to whole minutes, rounded up. */
  until?: Date | string;
}

export interface OverrideOutcome extends CommandOutcome {
  /** Minutes sent with a timed override. */
  minutes?: number;
}

export interface ExecutePlanOptions {
  sessionVars?: Record<string, string>;
  logLevel?: string;
}

export interface TempCodeInput {
  codeName: string;
  code: string;
  startTime?: Date | string;
  endTime?: Date | string;
}

export interface TempCodeWindow {
  startTime?: Date | string;
  endTime?: Date | string;
}

export interface OtrScheduleInput {
  doorIds: number[];
  start: Date | string;
  stop: Date | string;
  mode: ReaderMode;
  name?: string;
  description?: string;
}

export interface CommandClientConfig {
  session: SessionManager;
  partitionId: number;
  /** Default: 5 */
  defaultOverrideMinutes?: number;
  /** Suffix appended to cloned action plan names. Default: ' (DoorSync)' */
  cloneMarker?: string;
  now?: () => Date;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

const PAGE = { PageNumber: 1, PerPage: 500 } as const;

const OVERRIDE_TYPE_TOKENS: Record<OverrideType, string> = {
  [OverrideType.TIMED]: 'Time',
  [OverrideType.UNTIL_RESUMED]: 'Resume',
  [OverrideType.UNTIL_NEXT_SCHEDULE]: 'Schedule',
};

export const TEMP_CODE_PREFIX = 'DS-';
export const LOG_PLAN_NAME = 'DoorSync Door Log';
const TEMP_GROUP_PREFIX = 'DoorSync Temp Access - ';
const ALWAYS_TIME_ZONE_NAMES = ['always access', 'always', '24/7', 'all day', 'anytime', 'no restriction'];
const DEFAULT_ALWAYS_TIME_ZONE_ID = 2;
const DEFAULT_SECURITY_LEVEL_ID = 1;

const idResponse = z.object({ Id: z.coerce.number() }).passthrough();

const tempCodeSchema = z.object({
  codeName: z.string().min(1).max(60),
  code: z.string().regex(/^\d{1,9}$/, 'PIN must be 1-9 digits'),
});

// ============================================================================
// Override timing
// ============================================================================

/**
 * Minutes for a timed override. `until` wins over `minutes`; a target that is
 * unparseable or not in the future falls back to `defaultMinutes` and the
 * fallback is logged as a recoverable validation error.
 */
export function resolveOverrideMinutes(
  request: Pick<OverrideRequest, 'minutes' | 'until'>,
  defaultMinutes: number,
  now: Date,
  log?: Logger,
): number {
  if (request.until !== undefined) {
    const target = parseUtc(request.until);
    if (!target) {
      const err = new ValidationError(`Unparseable override end time: ${String(request.until)}`, 'until');
      log?.warn({ err, fallbackMinutes: defaultMinutes }, 'Override end time rejected, using default duration');
      return defaultMinutes;
    }
    const minutes = minutesUntil(target, now);
    if (minutes <= 0) {
      const err = new ValidationError(`Override end time ${target.toISOString()} is not in the future`, 'until');
      log?.warn({ err, fallbackMinutes: defaultMinutes }, 'Override end time rejected, using default duration');
      return defaultMinutes;
    }
    return minutes;
  }
  if (request.minutes !== undefined) {
    if (Number.isFinite(request.minutes) && request.minutes > 0) return Math.ceil(request.minutes);
    const err = new ValidationError(`Override minutes must be positive, got ${request.minutes}`, 'minutes');
    log?.warn({ err, fallbackMinutes: defaultMinutes }, 'Override duration rejected, using default duration');
  }
  return defaultMinutes;
}

// ============================================================================
// Client
// ============================================================================

export class CommandClient {
  private readonly session: SessionManager;
  private readonly partitionId: number;
  private readonly defaultOverrideMinutes: number;
  private readonly cloneMarker: string;
  private readonly now: () => Date;
  private readonly log: Logger;
  private legend: ModeLegend | undefined;

  constructor(config: CommandClientConfig) {
    this.session = config.session;
    this.partitionId = config.partitionId;
    this.defaultOverrideMinutes = config.defaultOverrideMinutes ?? 5;
    this.cloneMarker = config.cloneMarker ?? ' (DoorSync)';
    this.now = config.now ?? (() => new Date());
    this.log = config.logger ?? createLogger('command-client');
  }

  /** Use the panel's DoorTimeZoneMode legend when computing override mode indexes. */
  setModeLegend(legend: ModeLegend): void {
    this.legend = legend;
  }

  // ---------- Discovery ----------

  async getPartitions(): Promise<Partition[]> {
    const data = await this.session.execute({
      method: 'GET',
      path: '/api/Partitions/ByPrivilege/Manage_Doors',
      query: PAGE,
    });
    return readResults(data).flatMap((p) => {
      const id = readNumber(p, 'Id');
      return id === null ? [] : [{ id, name: readString(p, 'Name') ?? `Partition ${id}` }];
    });
  }

  async getDoors(partitionId = this.partitionId): Promise<PanelDoor[]> {
    const data = await this.session.execute({
      method: 'GET',
      path: '/api/doors',
      query: { PartitionId: partitionId, ...PAGE },
    });
    return readResults(data).flatMap((d) => {
      const id = readNumber(d, 'Id');
      if (id === null) return [];
      return [{
        id,
        name: readString(d, 'Name') ?? `Door ${id}`,
        partitionId: readNumber(d, 'PartitionId'),
        statusId: readString(d, 'StatusId'),
      }];
    });
  }

  async getAvailableReaders(partitionId = this.partitionId): Promise<Reader[]> {
    const data = await this.session.execute({
      method: 'GET',
      path: `/api/AccessPrivilegeGroups/AvailableReaders/${partitionId}`,
      query: PAGE,
    });
    return readResults(data).flatMap((r) => {
      const id = readNumber(r, 'Id');
      if (id === null) return [];
      return [{ id, name: readString(r, 'Name') ?? `Reader ${id}`, doorId: readNumber(r, 'DoorId') }];
    });
  }

  async getActionPlans(partitionId = this.partitionId): Promise<ActionPlan[]> {
    const data = await this.session.execute({
      method: 'GET',
      path: '/api/ActionPlans',
      query: { PartitionId: partitionId, ...PAGE },
    });
    return readResults(data).flatMap((p) => {
      const id = readNumber(p, 'Id');
      if (id === null) return [];
      return [{
        id,
        name: readString(p, 'Name') ?? `Plan ${id}`,
        planType: readString(p, 'PlanType') ?? 'Trigger',
        partitionId: readNumber(p, 'PartitionId'),
      }];
    });
  }

  /** Raw `/api/system/overview/System` tree. */
  async getSystemOverview(): Promise<unknown> {
    return this.session.execute({ method: 'GET', path: '/api/system/overview/System', timeoutMs: 15000 });
  }

  /** DoorTimeZoneMode legend: status-frame `timeZone` index → mode name. */
  async getModeLegend(): Promise<Map<number, string>> {
    const data = await this.session.execute({ method: 'GET', path: '/api/TimeSpanStates/DoorTimeZoneMode' });
    const legend = new Map<number, string>();
    for (const item of readResults(data)) {
      const index = readNumber(item, 'index');
      const name = readString(item, 'name');
      if (index !== null && name) legend.set(index, name);
    }
    return legend;
  }

  /**
   * Current status of one door. Only Odyssey servers expose this endpoint;
   * returns null when the server does not.
   */
  async getDoorStatus(doorId: number): Promise<JsonRecord | null> {
    for (const path of [`/api/Doors/${doorId}/Status`, `/api/doors/${doorId}/status`]) {
      try {
        const data = await this.session.execute({ method: 'GET', path });
        return readResult(data);
      } catch (err: unknown) {
        if (err instanceof RemoteRejection && err.statusCode === 404) continue;
        throw err;
      }
    }
    return null;
  }

  // ---------- Door commands ----------

  async pulse(doorIds: number[]): Promise<CommandOutcome> {
    return this.perTarget(doorIds, 'pulse', (doorId) =>
      this.session.execute({ method: 'POST', path: '/api/PanelCommands/PulseDoor', body: { DoorIds: [doorId] } }),
    );
  }

  async resume(doorIds: number[]): Promise<CommandOutcome> {
    return this.perTarget(doorIds, 'resume', (doorId) =>
      this.session.execute({ method: 'POST', path: '/api/PanelCommands/ResumeDoor', body: { DoorIds: [doorId] } }),
    );
  }

  async override(doorIds: number[], request: OverrideRequest): Promise<OverrideOutcome> {
    if (request.mode === ReaderMode.NONE) {
      return this.resume(doorIds);
    }
    const info = getReaderModeInfo(request.mode);
    const body: JsonRecord = {
      OverrideType: OVERRIDE_TYPE_TOKENS[request.type],
      TimeZoneMode: info?.commandToken ?? request.mode,
    };

    let minutes: number | undefined;
    if (request.type === OverrideType.TIMED) {
      minutes = resolveOverrideMinutes(request, this.defaultOverrideMinutes, this.now(), this.log);
      body.Minutes = minutes;
    }

    const index = readerModeIndex(request.mode, this.legend);
    if (index !== null) {
      body.ModeIndex = index;
      body.TimeZoneModeIndex = index;
      body.TimeZone = index;
      body.TimeZoneState = index;
    }

    const outcome = await this.perTarget(doorIds, 'override', (doorId) =>
      this.session.execute({
        method: 'POST',
        path: '/api/PanelCommands/OverrideDoor',
        body: { ...body, DoorIds: [doorId] },
      }),
    );
    return minutes === undefined ? outcome : { ...outcome, minutes };
  }

  /** Push configuration to every connected panel. */
  async updatePanels(): Promise<void> {
    await this.session.execute({ method: 'POST', path: '/api/PanelCommands/UpdateAll', body: {}, timeoutMs: 15000 });
    this.log.info('Update Panels command sent');
  }

  // ---------- Action plans ----------

  async executePlan(planId: number, options: ExecutePlanOptions = {}): Promise<void> {
    const path = options.logLevel
      ? `/api/ActionPlans/${planId}/Exec/${encodeURIComponent(options.logLevel)}`
      : `/api/ActionPlans/${planId}/Exec`;
    await this.session.execute({
      method: 'POST',
      path,
      query: { PartitionId: this.partitionId },
      body: { SessionVars: options.sessionVars ?? {} },
    });
    this.log.info({ planId }, 'Executed action plan');
  }

  async executePlans(planIds: number[], options: ExecutePlanOptions = {}): Promise<CommandOutcome> {
    return this.perTarget(planIds, 'execute plan', (planId) => this.executePlan(planId, options));
  }

  /**
   * Return the System-type copy of a plan, cloning it first when none exists.
   * A clone is made in two steps: create the skeleton, then PUT its Contents.
   */
  async findOrClonePlan(planId: number): Promise<number> {
    const plan = readResult(await this.session.execute({ method: 'GET', path: `/api/ActionPlans/${planId}` }));
    if (!plan) {
      throw new RemoteRejection(`Action plan ${planId} returned no detail`, 200);
    }

    const name = readString(plan, 'Name') ?? '';
    const planType = readString(plan, 'PlanType');
    if (planType === 'System' && name.endsWith(this.cloneMarker)) {
      return planId;
    }

    const cloneName = `${name.split(this.cloneMarker).join('')}${this.cloneMarker}`;
    const partitionId = readNumber(plan, 'PartitionId');
    const existing = await this.getActionPlans();
    const match = existing.find(
      (p) => p.planType === 'System' && p.name === cloneName && p.partitionId === partitionId,
    );
    if (match) return match.id;

    const cloneId = await this.createSystemPlan({
      Name: cloneName,
      Description: readString(plan, 'Description'),
      HighSecurity: readBoolean(plan, 'HighSecurity') ?? false,
      PartitionId: partitionId,
    }, readString(plan, 'Contents') ?? '');
    this.log.info({ planId, cloneId, cloneName }, 'Cloned action plan');
    return cloneId;
  }

  /** System plan that writes "<App> unlocked <Door>" to the panel log. */
  async ensureLogPlan(): Promise<number> {
    const existing = await this.getActionPlans();
    const match = existing.find(
      (p) => p.planType === 'System' && p.name === LOG_PLAN_NAME && p.partitionId === this.partitionId,
    );
    if (match) return match.id;

    const contents = {
      InitVar: {},
      Action: {
        _Type: 'Log',
        Parameters: { Level: 1, Message: '@{Session.App} unlocked @{Session.Door}' },
        Fail: null,
        Always: null,
        Then: null,
      },
    };
    return this.createSystemPlan({
      Name: LOG_PLAN_NAME,
      Description: 'Log each door unlock issued through doorsync',
      HighSecurity: false,
      PartitionId: this.partitionId,
    }, JSON.stringify(contents));
  }

  // ---------- Temp codes ----------

  async createTempCode(doorId: number, input: TempCodeInput): Promise<TempCode> {
    const parsed = tempCodeSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'Invalid temp code', String(issue?.path[0] ?? 'code'));
    }
    const startTime = optionalPanelTime(input.startTime, 'startTime');
    const endTime = optionalPanelTime(input.endTime, 'endTime');

    const doors = await this.getDoors();
    const doorName = doors.find((d) => d.id === doorId)?.name ?? `Door ${doorId}`;
    const groupId = await this.findOrCreateTempGroup(doorId, doorName);
    const securityLevelId = await this.securityLevelId();

    const user: JsonRecord = {
      FirstName: `${TEMP_CODE_PREFIX}${input.code}`,
      LastName: input.codeName.slice(0, 60),
      SecurityLevelId: securityLevelId,
      Partitions: [this.partitionId],
      AccessGroups: [],
      IsMaster: false,
      IsSupervisor: false,
      IsSecurity: false,
      FirstCardInEnabled: false,
      HandicapOpener: false,
      CanTripleSwipe: false,
    };
    if (startTime) user.StartedOn = startTime;
    if (endTime) user.ExpiresOn = endTime;

    const created = idResponse.safeParse(
      await this.session.execute({ method: 'POST', path: '/api/Users', body: user, timeoutMs: 15000 }),
    );
    if (!created.success || !created.data.Id) {
      throw new RemoteRejection('User creation returned no ID', 200, 'create temp code');
    }
    const userId = created.data.Id;

    try {
      await this.session.execute({ method: 'PUT', path: `/api/AccessPrivilegeGroups/${groupId}/Users/${userId}`, body: {} });
    } catch (err: unknown) {
      // The group may already be on the user.
      this.log.warn({ userId, groupId, err: errorMessage(err) }, 'Could not add temp user to access group');
    }

    try {
      await this.session.execute({
        method: 'POST',
        path: `/api/Users/${userId}/Credentials`,
        body: {
          Name: `PIN-${input.codeName}`,
          CredentialType: 'PinOnly',
          SiteCode: 0,
          CardNumber: 0,
          PinNumber: Number(input.code),
        },
      });
    } catch (err: unknown) {
      await this.deleteUser(userId).catch((cleanupErr: unknown) => {
        this.log.warn({ userId, err: errorMessage(cleanupErr) }, 'Could not remove temp user after PIN rejection');
      });
      if (err instanceof RemoteRejection) {
        throw new RemoteRejection(err.panelMessage, err.statusCode, 'PIN rejected');
      }
      throw err;
    }

    this.log.info({ doorId, userId, codeName: input.codeName }, 'Created temp code');
    return {
      doorId,
      codeName: input.codeName,
      code: input.code,
      userId,
      startTime: toIsoUtc(startTime),
      endTime: toIsoUtc(endTime),
    };
  }

  /** Temp codes whose users belong to the door's temp access group. */
  async listTempCodes(doorId: number): Promise<TempCode[]> {
    const doors = await this.getDoors();
    const door = doors.find((d) => d.id === doorId);
    if (!door) return [];
    const group = (await this.getAccessGroups()).find((g) => g.name === `${TEMP_GROUP_PREFIX}${door.name}`);
    if (!group) return [];

    const data = await this.session.execute({
      method: 'GET',
      path: `/api/AccessPrivilegeGroups/${group.id}/Users`,
      query: PAGE,
    });
    return readResults(data).flatMap((u) => {
      const code = tempCodeFromUser(u, doorId);
      return code ? [code] : [];
    });
  }

  /** Find the temp-code user holding `code`, by name first and then by credential. */
  async findTempCode(code: string): Promise<JsonRecord | null> {
    const users = await this.getPartitionUsers();
    const wanted = `${TEMP_CODE_PREFIX}${code}`;
    const byName = users.find((u) => readString(u, 'FirstName') === wanted);
    if (byName) return byName;

    for (const user of users) {
      const userId = readNumber(user, 'Id');
      if (userId === null || !(readString(user, 'FirstName') ?? '').startsWith(TEMP_CODE_PREFIX)) continue;
      const creds = readResults(await this.session.execute({
        method: 'GET',
        path: `/api/Users/${userId}/Credentials`,
        query: { PageNumber: 1, PerPage: 100 },
      }));
      if (creds.some((c) => readString(c, 'PinNumber') === code)) return user;
    }
    return null;
  }

  /** Change only the validity window of the temp code holding `code`. */
  async updateTempCode(code: string, window: TempCodeWindow): Promise<{ userId: number; startTime: string | null; endTime: string | null }> {
    const startTime = optionalPanelTime(window.startTime, 'startTime');
    const endTime = optionalPanelTime(window.endTime, 'endTime');
    const properties: Array<{ Name: string; Value: string }> = [];
    if (endTime) properties.push({ Name: 'ExpiresOn', Value: endTime });
    if (startTime) properties.push({ Name: 'StartedOn', Value: startTime });
    if (properties.length === 0) {
      throw new ValidationError('No start or end time to update', 'window');
    }

    const user = await this.findTempCode(code);
    const userId = user ? readNumber(user, 'Id') : null;
    if (userId === null) {
      throw new ValidationError(`No temp code found with PIN ${code}`, 'code');
    }

    await this.session.execute({ method: 'PUT', path: `/api/Users/${userId}`, body: { Properties: properties } });
    this.log.info({ userId, properties }, 'Updated temp code window');
    return { userId, startTime: toIsoUtc(startTime), endTime: toIsoUtc(endTime) };
  }

  async deleteTempCode(code: string): Promise<number> {
    const user = await this.findTempCode(code);
    const userId = user ? readNumber(user, 'Id') : null;
    if (userId === null) {
      throw new ValidationError(`No temp code found with PIN ${code}`, 'code');
    }
    await this.deleteUser(userId);
    this.log.info({ userId }, 'Deleted temp code');
    return userId;
  }

  // ---------- One-time-run schedules ----------

  async createOtrSchedule(input: OtrScheduleInput): Promise<OtrSchedule[]> {
    const mode = getReaderModeInfo(input.mode)?.scheduleToken;
    if (!mode) {
      throw new ValidationError(`Mode ${input.mode} cannot be scheduled`, 'mode');
    }
    if (input.doorIds.length === 0) {
      throw new ValidationError('At least one door is required', 'doorIds');
    }
    const start = parseUtc(input.start);
    const stop = parseUtc(input.stop);
    if (!start || !stop) {
      throw new ValidationError('Invalid start or stop time', start ? 'stop' : 'start');
    }
    if (stop.getTime() <= start.getTime()) {
      throw new ValidationError('Stop time must be after start time', 'stop');
    }

    const startTime = toPanelTime(start);
    const stopTime = toPanelTime(stop);
    const name = (input.name ?? `DoorSync Schedule ${startTime.replace(/[-:]/g, '').replace('T', '_')}`).slice(0, 60);
    const body: JsonRecord = {
      Name: name,
      StartTime: startTime,
      StopTime: stopTime,
      Doors: input.doorIds.map((id) => ({ Id: id, Mode: mode })),
      Dates: [{ StartTime: startTime, StopTime: stopTime }],
    };
    if (input.description) body.Description = input.description.slice(0, 255);

    const created = idResponse.safeParse(
      await this.session.execute({ method: 'POST', path: '/api/OneTimeRunTimeZones/Doors', body, timeoutMs: 15000 }),
    );
    let id = created.success ? created.data.Id : 0;

    // The panel often answers Id 0 on success; look the schedule up by name.
    if (id === 0) {
      const listed = (await this.listOtrSchedules()).find((s) => s.name === name);
      if (listed) id = listed.id;
    }

    this.log.info({ id, name, doorIds: input.doorIds, mode }, 'Created one-time-run schedule');
    const doors = await this.getDoors();
    return input.doorIds.map((doorId) => ({
      id,
      doorId,
      doorName: doors.find((d) => d.id === doorId)?.name ?? null,
      name,
      mode,
      startUtc: start.toISOString(),
      stopUtc: stop.toISOString(),
      description: input.description,
    }));
  }

  /** Schedules on the panel, optionally only those for one door. */
  async listOtrSchedules(doorId?: number): Promise<OtrSchedule[]> {
    const data = await this.session.execute({
      method: 'GET',
      path: '/api/OneTimeRunTimeZones/Doors',
      query: { PageNumber: 1, PerPage: 100 },
      timeoutMs: 15000,
    });
    const doors = await this.getDoors();
    const idByName = new Map(doors.map((d) => [d.name, d.id]));

    const schedules: OtrSchedule[] = [];
    for (const r of readResults(data)) {
      const id = readNumber(r, 'Id');
      if (id === null) continue;
      const doorName = readString(r, 'DoorName');
      const resolvedId = readNumber(r, 'DoorId') ?? (doorName ? idByName.get(doorName) ?? null : null);
      if (doorId !== undefined && resolvedId !== doorId) continue;
      schedules.push({
        id,
        doorId: resolvedId,
        doorName,
        name: readString(r, 'Name') ?? '',
        mode: readString(r, 'Mode') ?? '',
        startUtc: toIsoUtc(readString(r, 'StartTime')),
        stopUtc: toIsoUtc(readString(r, 'StopTime')),
        description: readString(r, 'Description') ?? undefined,
      });
    }
    return schedules;
  }

  async deleteOtrSchedule(scheduleId: number): Promise<void> {
    await this.session.execute({ method: 'DELETE', path: `/api/OneTimeRunTimeZones/Doors/${scheduleId}` });
    this.log.info({ scheduleId }, 'Deleted one-time-run schedule');
  }

  // ---------- Internals ----------

  private async perTarget(
    targets: number[],
    operation: string,
    run: (target: number) => Promise<unknown>,
  ): Promise<CommandOutcome> {
    const results = await Promise.all(
      targets.map(async (target): Promise<TargetResult<number>> => {
        try {
          await run(target);
          return { target, success: true };
        } catch (err: unknown) {
          this.log.error({ target, operation, err: errorMessage(err) }, 'Command failed');
          return { target, success: false, error: errorMessage(err) };
        }
      }),
    );
    const outcome = summarizeOutcome(results);
    this.log.info({ operation, succeeded: outcome.succeeded, failed: outcome.failed }, 'Command finished');
    return outcome;
  }

  private async createSystemPlan(skeleton: JsonRecord, contents: string): Promise<number> {
    const created = idResponse.safeParse(await this.session.execute({
      method: 'POST',
      path: '/api/ActionPlans',
      body: { PlanType: 'System', ...skeleton },
    }));
    if (!created.success) {
      throw new RemoteRejection('Action plan creation returned no ID', 200, 'create action plan');
    }
    const id = created.data.Id;
    await this.session.execute({
      method: 'PUT',
      path: `/api/ActionPlans/${id}`,
      body: { Id: id, Properties: [{ Name: 'Contents', Value: contents }] },
    });
    return id;
  }

  private async getAccessGroups(): Promise<Array<{ id: number; name: string }>> {
    const data = await this.session.execute({
      method: 'GET',
      path: '/api/AccessPrivilegeGroups',
      query: { PartitionId: this.partitionId, ...PAGE },
    });
    return readResults(data).flatMap((g) => {
      const id = readNumber(g, 'Id');
      const name = readString(g, 'Name');
      return id === null || name === null ? [] : [{ id, name }];
    });
  }

  private async findOrCreateTempGroup(doorId: number, doorName: string): Promise<number> {
    const groupName = `${TEMP_GROUP_PREFIX}${doorName}`;
    const existing = (await this.getAccessGroups()).find((g) => g.name === groupName);
    if (existing) {
      const assigned = readResults(await this.session.execute({
        method: 'GET',
        path: `/api/AccessPrivilegeGroups/${existing.id}/Readers`,
      }));
      if (assigned.length === 0) {
        await this.assignDoorReaders(existing.id, doorId);
      }
      return existing.id;
    }

    const holidayGroups = readResults(await this.session.execute({
      method: 'GET',
      path: '/api/UserHolidayGroups',
      query: { PageNumber: 1, PerPage: 100 },
    }));
    const holidayGroupId = holidayGroups[0] ? readNumber(holidayGroups[0], 'Id') : null;
    if (holidayGroupId === null) {
      throw new RemoteRejection('No holiday time zone groups found, cannot create access group', 200, 'create temp code');
    }

    const created = idResponse.safeParse(await this.session.execute({
      method: 'POST',
      path: '/api/AccessPrivilegeGroups',
      body: {
        GroupType: 'Local',
        Name: groupName,
        Description: `doorsync temporary access for ${doorName}`,
        HolidayTimeZoneGroupId: holidayGroupId,
        PartitionId: this.partitionId,
      },
    }));
    if (!created.success || !created.data.Id) {
      throw new RemoteRejection('Access group creation returned no ID', 200, 'create temp code');
    }
    this.log.info({ groupId: created.data.Id, groupName }, 'Created temp access group');
    await this.assignDoorReaders(created.data.Id, doorId);
    return created.data.Id;
  }

  private async assignDoorReaders(groupId: number, doorId: number): Promise<void> {
    const readers = (await this.getAvailableReaders()).filter((r) => r.doorId === doorId);
    if (readers.length === 0) {
      throw new RemoteRejection(`No readers found for door ${doorId}`, 200, 'create temp code');
    }
    const timeZoneId = await this.alwaysTimeZoneId();
    for (const reader of readers) {
      try {
        await this.session.execute({
          method: 'PUT',
          path: `/api/AccessPrivilegeGroups/${groupId}/Readers/${reader.id}/${timeZoneId}`,
          body: {},
        });
      } catch (err: unknown) {
        this.log.warn({ groupId, readerId: reader.id, err: errorMessage(err) }, 'Could not assign reader to access group');
      }
    }
  }

  private async alwaysTimeZoneId(): Promise<number> {
    try {
      const zones = readResults(await this.session.execute({
        method: 'GET',
        path: '/api/UserTimeZones',
        query: { PageNumber: 1, PerPage: 100 },
      }));
      for (const zone of zones) {
        const name = (readString(zone, 'Name') ?? '').toLowerCase();
        const id = readNumber(zone, 'Id');
        if (id !== null && ALWAYS_TIME_ZONE_NAMES.some((n) => name.includes(n))) return id;
      }
    } catch (err: unknown) {
      this.log.debug({ err: errorMessage(err) }, 'User time zones unavailable');
    }
    return DEFAULT_ALWAYS_TIME_ZONE_ID;
  }

  private async securityLevelId(): Promise<number> {
    try {
      const levels = readResults(await this.session.execute({
        method: 'GET',
        path: '/api/SecurityLevels',
        query: { PageNumber: 1, PerPage: 100 },
      }));
      const first = levels[0];
      return (first ? readNumber(first, 'Id') : null) ?? DEFAULT_SECURITY_LEVEL_ID;
    } catch (err: unknown) {
      // Not every panel version has this endpoint.
      this.log.debug({ err: errorMessage(err) }, 'Security levels unavailable');
      return DEFAULT_SECURITY_LEVEL_ID;
    }
  }

  private async getPartitionUsers(): Promise<JsonRecord[]> {
    return readResults(await this.session.execute({
      method: 'GET',
      path: `/api/Partitions/${this.partitionId}/Users`,
      query: PAGE,
      timeoutMs: 15000,
    }));
  }

  private async deleteUser(userId: number): Promise<void> {
    await this.session.execute({ method: 'DELETE', path: `/api/Users/${userId}`, query: { forceDelete: true } });
  }
}


function optionalPanelTime(value: Date | string | undefined, field: string): string | null {
  if (value === undefined) return null;
  const parsed = parseUtc(value);
  if (!parsed) throw new ValidationError(`Invalid ${field}: ${String(value)}`, field);
  return toPanelTime(parsed);
}

function tempCodeFromUser(user: JsonRecord, doorId: number): TempCode | null {
  const firstName = readString(user, 'FirstName') ?? '';
  const userId = readNumber(user, 'Id');
  if (!firstName.startsWith(TEMP_CODE_PREFIX) || userId === null) return null;
  return {
    doorId,
    codeName: readString(user, 'LastName') ?? '',
    code: firstName.slice(TEMP_CODE_PREFIX.length),
    userId,
    startTime: toIsoUtc(readString(user, 'StartedOn')),
    endTime: toIsoUtc(readString(user, 'ExpiresOn')),
  };
}
