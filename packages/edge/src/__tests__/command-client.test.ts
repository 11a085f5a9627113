import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OverrideType, ReaderMode } from '@doorsync/core';
import { CommandClient, resolveOverrideMinutes } from '../command-client.js';
import { RemoteRejection, ValidationError, createLogger } from '../edge-logger.js';
import { SessionManager } from '../session-manager.js';
import { FakePanel, json } from './fake-panel.js';

const NOW = new Date('2026-03-01T12:00:00Z');

const FRONT_DOOR = { Id: 7, Name: 'Front Door', PartitionId: 3, StatusId: 'P1::D7' };

function createClient(): CommandClient {
  const session = new SessionManager({
    baseUrl: 'https://panel.test',
    username: 'operator',
    password: 'test-secret',
    verifyTls: true,
  });
  return new CommandClient({ session, partitionId: 3, defaultOverrideMinutes: 5, now: () => NOW });
}

describe('resolveOverrideMinutes', () => {
  it('converts an end time 30 minutes ahead to 30 minutes', () => {
    expect(resolveOverrideMinutes({ until: new Date('2026-03-01T12:30:00Z') }, 5, NOW)).toBe(30);
  });

  it('rounds partial minutes up', () => {
    expect(resolveOverrideMinutes({ until: '2026-03-01T12:29:30Z' }, 5, NOW)).toBe(30);
    expect(resolveOverrideMinutes({ minutes: 2.2 }, 5, NOW)).toBe(3);
  });

  it('reads end times without an offset as UTC', () => {
    expect(resolveOverrideMinutes({ until: '2026-03-01 12:45:00' }, 5, NOW)).toBe(45);
  });

  it('falls back to the default for past, same-minute and unparseable end times', () => {
    const log = createLogger('command-client-test');
    const warn = vi.spyOn(log, 'warn');

    expect(resolveOverrideMinutes({ until: '2026-03-01T11:00:00Z' }, 5, NOW, log)).toBe(5);
    expect(resolveOverrideMinutes({ until: '2026-03-01T11:59:50Z' }, 5, NOW, log)).toBe(5);
    expect(resolveOverrideMinutes({ until: 'next tuesday' }, 5, NOW, log)).toBe(5);

    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn.mock.calls[0]?.[0]).toMatchObject({ err: expect.any(ValidationError), fallbackMinutes: 5 });
  });

  it('prefers until over minutes', () => {
    expect(resolveOverrideMinutes({ minutes: 90, until: '2026-03-01T12:10:00Z' }, 5, NOW)).toBe(10);
  });

  it('uses the default for non-positive or missing minutes', () => {
    expect(resolveOverrideMinutes({ minutes: -1 }, 5, NOW)).toBe(5);
    expect(resolveOverrideMinutes({}, 5, NOW)).toBe(5);
  });
});

describe('CommandClient', () => {
  let panel: FakePanel;
  let client: CommandClient;

  beforeEach(() => {
    panel = new FakePanel();
    vi.stubGlobal('fetch', panel.fetch);
    client = createClient();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ==========================================================================
  // Door commands
  // ==========================================================================

  describe('override', () => {
    it('sends a timed override with minutes and the mode index under every key', async () => {
      panel.reply('POST', '/api/PanelCommands/OverrideDoor', {});

      const outcome = await client.override([7], {
        type: OverrideType.TIMED,
        mode: ReaderMode.UNLOCK,
        until: '2026-03-01T12:30:00Z',
      });

      expect(outcome.minutes).toBe(30);
      expect(outcome.succeeded).toEqual([7]);
      expect(panel.callsTo('POST', '/api/PanelCommands/OverrideDoor')[0]?.body).toEqual({
        OverrideType: 'Time',
        TimeZoneMode: 'Unlock',
        Minutes: 30,
        ModeIndex: 5,
        TimeZoneModeIndex: 5,
        TimeZone: 5,
        TimeZoneState: 5,
        DoorIds: [7],
      });
    });

    it('uses the panel legend index and the aliased command token', async () => {
      panel.reply('POST', '/api/PanelCommands/OverrideDoor', {});
      client.setModeLegend(new Map([[11, 'First Credential In']]));

      await client.override([7], { type: OverrideType.UNTIL_RESUMED, mode: ReaderMode.FIRST_CREDENTIAL_IN });

      const body = panel.callsTo('POST', '/api/PanelCommands/OverrideDoor')[0]?.body;
      expect(body).toMatchObject({ OverrideType: 'Resume', TimeZoneMode: 'UnlockWithFirstCardIn', ModeIndex: 11 });
      expect(body).not.toHaveProperty('Minutes');
    });

    it('reports a failing door and still applies the others', async () => {
      panel.on('POST', '/api/PanelCommands/OverrideDoor', (call) => {
        return JSON.stringify(call.body).includes('"DoorIds":[9]') ? json({ Message: 'Door 9 is offline' }, 500) : json({});
      });

      const outcome = await client.override([7, 9, 8], {
        type: OverrideType.UNTIL_NEXT_SCHEDULE,
        mode: ReaderMode.CARD_OR_PIN,
      });

      expect(outcome.succeeded).toEqual([7, 8]);
      expect(outcome.failed).toEqual([9]);
      expect(outcome.results[1]).toEqual({
        target: 9,
        success: false,
        error: 'POST /api/PanelCommands/OverrideDoor: Door 9 is offline',
      });
      expect(panel.callsTo('POST', '/api/PanelCommands/OverrideDoor')).toHaveLength(3);
    });

    it('resumes instead when the mode is NONE', async () => {
      panel.reply('POST', '/api/PanelCommands/ResumeDoor', {});

      const outcome = await client.override([7], { type: OverrideType.UNTIL_RESUMED, mode: ReaderMode.NONE });

      expect(outcome.succeeded).toEqual([7]);
      expect(panel.callsTo('POST', '/api/PanelCommands/OverrideDoor')).toHaveLength(0);
      expect(panel.callsTo('POST', '/api/PanelCommands/ResumeDoor')[0]?.body).toEqual({ DoorIds: [7] });
    });
  });

  it('pulses each door with its own request', async () => {
    panel.reply('POST', '/api/PanelCommands/PulseDoor', {});

    const outcome = await client.pulse([7, 8]);

    expect(outcome.succeeded).toEqual([7, 8]);
    expect(panel.callsTo('POST', '/api/PanelCommands/PulseDoor').map((c) => c.body)).toEqual([
      { DoorIds: [7] },
      { DoorIds: [8] },
    ]);
  });

  // ==========================================================================
  // Discovery
  // ==========================================================================

  describe('discovery', () => {
    it('lists partition doors with their status ids', async () => {
      panel.reply('GET', '/api/doors', { Results: [FRONT_DOOR, { Id: 'x' }] });

      expect(await client.getDoors()).toEqual([
        { id: 7, name: 'Front Door', partitionId: 3, statusId: 'P1::D7' },
      ]);
      const [call] = panel.callsTo('GET', '/api/doors');
      expect(call?.query.get('PartitionId')).toBe('3');
      expect(call?.query.get('PerPage')).toBe('500');
    });

    it('reads the mode legend', async () => {
      panel.reply('GET', '/api/TimeSpanStates/DoorTimeZoneMode', [
        { index: 1, name: 'Card' },
        { index: 5, name: 'Unlock' },
      ]);

      expect([...(await client.getModeLegend()).entries()]).toEqual([
        [1, 'Card'],
        [5, 'Unlock'],
      ]);
    });

    it('falls back to the lowercase status path and returns null when neither exists', async () => {
      panel.reply('GET', '/api/doors/7/status', { Result: { lockState: 'Unlocked' } });

      expect(await client.getDoorStatus(7)).toEqual({ lockState: 'Unlocked' });
      expect(await client.getDoorStatus(8)).toBeNull();
    });
  });

  // ==========================================================================
  // Action plans
  // ==========================================================================

  it('executes plans with a log level and session variables', async () => {
    panel.reply('POST', '/api/ActionPlans/4/Exec/Info', {});
    panel.reply('POST', '/api/ActionPlans/5/Exec/Info', { Message: 'Plan disabled' }, 400);

    const outcome = await client.executePlans([4, 5], { logLevel: 'Info', sessionVars: { Door: 'Front Door' } });

    expect(outcome.succeeded).toEqual([4]);
    expect(outcome.failed).toEqual([5]);
    const [call] = panel.callsTo('POST', '/api/ActionPlans/4/Exec/Info');
    expect(call?.query.get('PartitionId')).toBe('3');
    expect(call?.body).toEqual({ SessionVars: { Door: 'Front Door' } });
  });

  it('reuses an existing log plan', async () => {
    panel.reply('GET', '/api/ActionPlans', {
      Results: [{ Id: 12, Name: 'DoorSync Door Log', PlanType: 'System', PartitionId: 3 }],
    });

    expect(await client.ensureLogPlan()).toBe(12);
    expect(panel.callsTo('POST', '/api/ActionPlans')).toHaveLength(0);
  });

  // ==========================================================================
  // Temp codes
  // ==========================================================================

  describe('temp codes', () => {
    function mockTempCodeSetup(): void {
      panel.reply('GET', '/api/doors', { Results: [FRONT_DOOR] });
      panel.reply('GET', '/api/AccessPrivilegeGroups', { Results: [{ Id: 5, Name: 'DoorSync Temp Access - Front Door' }] });
      panel.reply('GET', '/api/AccessPrivilegeGroups/5/Readers', { Results: [{ Id: 70 }] });
      panel.reply('GET', '/api/SecurityLevels', { Results: [{ Id: 2 }] });
      panel.reply('POST', '/api/Users', { Id: 41 });
      panel.reply('PUT', '/api/AccessPrivilegeGroups/5/Users/41', {});
      panel.reply('DELETE', '/api/Users/41', {});
    }

    it('creates the user, joins the door group and adds a PIN credential', async () => {
      mockTempCodeSetup();
      panel.reply('POST', '/api/Users/41/Credentials', {});

      const code = await client.createTempCode(7, { codeName: 'Guest', code: '1234' });

      expect(code).toEqual({ doorId: 7, codeName: 'Guest', code: '1234', userId: 41, startTime: null, endTime: null });
      expect(panel.callsTo('POST', '/api/Users')[0]?.body).toMatchObject({
        FirstName: 'DS-1234',
        LastName: 'Guest',
        SecurityLevelId: 2,
        Partitions: [3],
      });
      expect(panel.callsTo('POST', '/api/Users/41/Credentials')[0]?.body).toEqual({
        Name: 'PIN-Guest',
        CredentialType: 'PinOnly',
        SiteCode: 0,
        CardNumber: 0,
        PinNumber: 1234,
      });
    });

    it('removes the user and reports the panel text when the PIN is rejected', async () => {
      mockTempCodeSetup();
      panel.reply('POST', '/api/Users/41/Credentials', { Message: 'PIN already in use' }, 400);

      const err = await client.createTempCode(7, { codeName: 'Guest', code: '1234' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RemoteRejection);
      expect(err).toMatchObject({ panelMessage: 'PIN already in use', message: 'PIN rejected: PIN already in use' });
      const [deleted] = panel.callsTo('DELETE', '/api/Users/41');
      expect(deleted?.query.get('forceDelete')).toBe('true');
    });

    it('rejects a non-numeric PIN before calling the panel', async () => {
      await expect(client.createTempCode(7, { codeName: 'Guest', code: '12ab' })).rejects.toMatchObject({
        name: 'ValidationError',
        field: 'code',
      });
      expect(panel.calls).toHaveLength(0);
    });

    it('updates only the validity window of the matching PIN', async () => {
      panel.reply('GET', '/api/Partitions/3/Users', {
        Results: [
          { Id: 40, FirstName: 'DS-9999', LastName: 'Other' },
          { Id: 41, FirstName: 'DS-1234', LastName: 'Guest' },
        ],
      });
      panel.reply('PUT', '/api/Users/41', {});

      const result = await client.updateTempCode('1234', {
        startTime: '2026-03-01T08:00:00',
        endTime: new Date('2026-03-02T18:00:00Z'),
      });

      expect(result).toEqual({
        userId: 41,
        startTime: '2026-03-01T08:00:00.000Z',
        endTime: '2026-03-02T18:00:00.000Z',
      });
      const puts = panel.calls.filter((c) => c.method === 'PUT');
      expect(puts).toHaveLength(1);
      expect(puts[0]?.body).toEqual({
        Properties: [
          { Name: 'ExpiresOn', Value: '2026-03-02T18:00:00' },
          { Name: 'StartedOn', Value: '2026-03-01T08:00:00' },
        ],
      });
      expect(panel.calls.some((c) => c.path.includes('/Credentials'))).toBe(false);
    });

    it('rejects an update for an unknown PIN', async () => {
      panel.reply('GET', '/api/Partitions/3/Users', { Results: [] });

      await expect(client.updateTempCode('5555', { endTime: '2026-03-02T18:00:00Z' })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('lists the codes held by the door group', async () => {
      panel.reply('GET', '/api/doors', { Results: [FRONT_DOOR] });
      panel.reply('GET', '/api/AccessPrivilegeGroups', { Results: [{ Id: 5, Name: 'DoorSync Temp Access - Front Door' }] });
      panel.reply('GET', '/api/AccessPrivilegeGroups/5/Users', {
        Results: [
          { Id: 41, FirstName: 'DS-1234', LastName: 'Guest', ExpiresOn: '2026-03-02T18:00:00' },
          { Id: 42, FirstName: 'Jordan', LastName: 'Staff' },
        ],
      });

      expect(await client.listTempCodes(7)).toEqual([
        { doorId: 7, codeName: 'Guest', code: '1234', userId: 41, startTime: null, endTime: '2026-03-02T18:00:00.000Z' },
      ]);
    });
  });

  // ==========================================================================
  // One-time-run schedules
  // ==========================================================================

  describe('one-time-run schedules', () => {
    it('sends both time forms and resolves an Id of 0 by name', async () => {
      panel.reply('POST', '/api/OneTimeRunTimeZones/Doors', { Id: 0 });
      panel.reply('GET', '/api/OneTimeRunTimeZones/Doors', {
        Results: [
          {
            Id: 77,
            Name: 'Assembly',
            DoorName: 'Front Door',
            Mode: 'Unlock',
            StartTime: '2026-03-05T14:00:00',
            StopTime: '2026-03-05T15:00:00',
          },
        ],
      });
      panel.reply('GET', '/api/doors', { Results: [FRONT_DOOR] });

      const created = await client.createOtrSchedule({
        doorIds: [7],
        start: '2026-03-05T14:00:00',
        stop: new Date('2026-03-05T15:00:00Z'),
        mode: ReaderMode.FIRST_CREDENTIAL_IN,
        name: 'Assembly',
      });

      expect(created).toEqual([
        {
          id: 77,
          doorId: 7,
          doorName: 'Front Door',
          name: 'Assembly',
          mode: 'UnlockWithFirstCardIn',
          startUtc: '2026-03-05T14:00:00.000Z',
          stopUtc: '2026-03-05T15:00:00.000Z',
        },
      ]);
      expect(panel.callsTo('POST', '/api/OneTimeRunTimeZones/Doors')[0]?.body).toEqual({
        Name: 'Assembly',
        StartTime: '2026-03-05T14:00:00',
        StopTime: '2026-03-05T15:00:00',
        Doors: [{ Id: 7, Mode: 'UnlockWithFirstCardIn' }],
        Dates: [{ StartTime: '2026-03-05T14:00:00', StopTime: '2026-03-05T15:00:00' }],
      });
    });

    it('validates mode and time order', async () => {
      await expect(
        client.createOtrSchedule({ doorIds: [7], start: '2026-03-05T14:00:00', stop: '2026-03-05T15:00:00', mode: ReaderMode.NONE }),
      ).rejects.toMatchObject({ name: 'ValidationError', field: 'mode' });
      await expect(
        client.createOtrSchedule({ doorIds: [7], start: '2026-03-05T15:00:00', stop: '2026-03-05T14:00:00', mode: ReaderMode.CARD }),
      ).rejects.toMatchObject({ name: 'ValidationError', field: 'stop' });
    });

    it('filters listed schedules by door', async () => {
      panel.reply('GET', '/api/OneTimeRunTimeZones/Doors', {
        Results: [
          { Id: 1, Name: 'A', DoorName: 'Front Door', Mode: 'Unlock' },
          { Id: 2, Name: 'B', DoorId: 8, Mode: 'Card' },
        ],
      });
      panel.reply('GET', '/api/doors', { Results: [FRONT_DOOR] });

      const schedules = await client.listOtrSchedules(7);
      expect(schedules.map((s) => s.id)).toEqual([1]);
      expect(schedules[0]?.doorId).toBe(7);
    });
  });
});
