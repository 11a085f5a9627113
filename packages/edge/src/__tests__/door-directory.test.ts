import { describe, it, expect, vi } from 'vitest';
import type { Reader } from '@doorsync/core';
import type { PanelDoor } from '../command-client.js';
import { DoorDirectory, normalizeName, stripReaderSuffix, type DirectorySource } from '../door-directory.js';

const DOORS: PanelDoor[] = [
  { id: 7, name: 'Front Door', partitionId: 3, statusId: 'P1::D7' },
  { id: 8, name: 'Gym Gate', partitionId: 3, statusId: null },
];

const OVERVIEW = {
  Status: {
    Nodes: [
      {
        Type: 'Site',
        Nodes: [
          {
            Type: 'Door',
            Id: 8,
            Name: 'Gym Gate',
            StatusId: 'P2::D8',
            Nodes: [{ Type: 'Reader', Id: 81, Name: 'Gym Gate Reader 2' }],
          },
          {
            Type: 'Door',
            Id: 99,
            Name: 'Other Partition Door',
            StatusId: 'P9::D99',
            Nodes: [{ Type: 'Reader', Id: 991, Name: 'Hidden Reader' }],
          },
        ],
      },
    ],
  },
};

const READERS: Reader[] = [
  { id: 71, name: 'Front Door Reader', doorId: 7 },
  { id: 5, name: 'Foreign', doorId: 99 },
];

function createSource(overrides: Partial<DirectorySource> = {}) {
  return {
    getDoors: vi.fn(async () => DOORS),
    getSystemOverview: vi.fn(async (): Promise<unknown> => OVERVIEW),
    getAvailableReaders: vi.fn(async () => READERS),
    ...overrides,
  };
}

describe('name helpers', () => {
  it('collapses whitespace and case', () => {
    expect(normalizeName('  Front   DOOR ')).toBe('front door');
  });

  it('strips reader and door suffixes', () => {
    expect(stripReaderSuffix('Main Entrance Reader 2')).toBe('main entrance');
    expect(stripReaderSuffix('Front Door')).toBe('front');
    expect(stripReaderSuffix('Lobby')).toBe('lobby');
  });
});

describe('DoorDirectory', () => {
  it('indexes status ids from the door list and the overview tree', async () => {
    const directory = new DoorDirectory(createSource());
    await directory.refresh();

    expect(directory.version).toBe(1);
    expect(directory.doorIds()).toEqual([7, 8]);
    expect(directory.doorForStatusId('P1::D7')).toBe(7);
    expect(directory.doorForStatusId('P2::D8')).toBe(8);
    expect(directory.doorForStatusId('P9::D99')).toBeNull();
    expect(directory.panels()).toEqual(['P1', 'P2']);
    expect(directory.isKnownPanel('P2::D44')).toBe(true);
    expect(directory.isKnownPanel('P9::D1')).toBe(false);
  });

  it('joins a refresh that is already running', async () => {
    const source = createSource();
    const directory = new DoorDirectory(source);

    await Promise.all([directory.refresh(), directory.refresh()]);

    expect(source.getDoors).toHaveBeenCalledTimes(1);
    expect(directory.version).toBe(1);
  });

  it('still builds from the door list when the overview fails', async () => {
    const directory = new DoorDirectory(
      createSource({
        getSystemOverview: vi.fn(async (): Promise<unknown> => {
          throw new Error('overview unavailable');
        }),
      }),
    );
    await directory.refresh();

    expect(directory.doorForStatusId('P1::D7')).toBe(7);
    expect(directory.doorForStatusId('P2::D8')).toBeNull();
  });

  describe('doorForNotification', () => {
    async function loaded(): Promise<DoorDirectory> {
      const directory = new DoorDirectory(createSource());
      await directory.refresh();
      return directory;
    }

    it('uses the id of a door source as is', async () => {
      const directory = await loaded();
      expect(directory.doorForNotification({ sourceType: 'Door', sourceName: '', sourceId: 8, message: '' })).toBe(8);
    });

    it('maps readers by id from the tree and by name from the reader list', async () => {
      const directory = await loaded();

      expect(directory.doorForNotification({ sourceType: 'Reader', sourceName: '', sourceId: 81, message: '' })).toBe(8);
      expect(
        directory.doorForNotification({
          sourceType: 'Reader',
          sourceName: 'Front Door Reader',
          sourceId: null,
          message: 'Access granted',
        }),
      ).toBe(7);
      expect(directory.doorForNotification({ sourceType: 'Reader', sourceName: '', sourceId: 991, message: '' })).toBeNull();
    });

    it('falls back to door names inside the message', async () => {
      const directory = await loaded();

      expect(
        directory.doorForNotification({
          sourceType: 'System',
          sourceName: '',
          sourceId: null,
          message: 'Door overridden on gym gate',
        }),
      ).toBe(8);
      expect(
        directory.doorForNotification({ sourceType: 'System', sourceName: '', sourceId: null, message: 'Panel restarted' }),
      ).toBeNull();
    });
  });
});
