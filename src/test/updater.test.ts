import {readFile, writeFile} from 'fs/promises';
import {join} from 'path';

import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import type {DomainConfig} from '../library/index.js';
import {
  DNSProviderClient,
  DNSUpdater,
  DetectionError,
  ProviderUnavailableError,
  RecordNotFoundError,
  StateLog,
} from '../library/index.js';

import {
  createFakeDetector,
  createFakeProvider,
  createFakeReporter,
} from './@fakes.js';
import {createTempDir, removeTempDir} from './@fs.js';

const PREVIOUS_ENTRY = '2024-01-01T00:00:00+00:00 203.0.113.5\n';

const DOMAINS: DomainConfig[] = [
  {
    domain: 'example.com',
    records: [{name: 'www.example.com', type: 'A'}],
  },
];

const RECORD_MAP = {
  'example.com': [
    {id: 'abc123', name: 'www.example.com', type: 'A', data: '203.0.113.5'},
  ],
};

let dir: string;
let stateLogPath: string;

beforeEach(async () => {
  dir = await createTempDir();
  stateLogPath = join(dir, 'public-ip-address.log');
});

afterEach(async () => {
  await removeTempDir(dir);
});

function createUpdater({
  address = '203.0.113.9',
  domains = DOMAINS,
  recordMap = RECORD_MAP,
}: {
  address?: string;
  domains?: DomainConfig[];
  recordMap?: Parameters<typeof createFakeProvider>[0];
} = {}) {
  const detector = createFakeDetector(address);
  const provider = createFakeProvider(recordMap);
  const reporter = createFakeReporter();

  const updater = new DNSUpdater({
    detector,
    stateLog: new StateLog(stateLogPath),
    client: new DNSProviderClient(provider),
    reporter,
    domains,
  });

  return {updater, detector, provider, reporter};
}

describe('DNSUpdater', () => {
  it('updates records when the address changed', async () => {
    await writeFile(stateLogPath, PREVIOUS_ENTRY);

    const {updater, provider, reporter} = createUpdater();

    const result = await updater.run();

    expect(result).toMatchObject({
      status: 'updated',
      address: '203.0.113.9',
      previousAddress: '203.0.113.5',
      records: [
        {
          domain: 'example.com',
          name: 'www.example.com',
          type: 'A',
          id: 'abc123',
        },
      ],
    });

    expect(provider.updateRecord).toHaveBeenCalledTimes(1);
    expect(provider.updateRecord).toHaveBeenCalledWith(
      'example.com',
      'abc123',
      '203.0.113.9',
    );

    const lines = (await readFile(stateLogPath, 'utf8')).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(PREVIOUS_ENTRY.trim());
    expect(lines[1].endsWith(' 203.0.113.9')).toBe(true);
    expect(lines[2]).toBe('');

    expect(reporter.info.mock.calls.map(([message]) => message)).toEqual([
      'The public IP address is 203.0.113.9',
      'The last public IP address was 203.0.113.5',
      'Updating DNS example.com, A record www.example.com (abc123) ...',
      'All updates performed.',
    ]);
  });

  it('does nothing when the address did not change', async () => {
    await writeFile(stateLogPath, PREVIOUS_ENTRY);

    const {updater, provider, reporter} = createUpdater({
      address: '203.0.113.5',
    });

    await expect(updater.run()).resolves.toEqual({
      status: 'unchanged',
      address: '203.0.113.5',
    });

    expect(provider.listRecords).not.toHaveBeenCalled();
    expect(provider.updateRecord).not.toHaveBeenCalled();
    expect(await readFile(stateLogPath, 'utf8')).toBe(PREVIOUS_ENTRY);
    expect(reporter.info).toHaveBeenLastCalledWith('No updates performed.');
  });

  it('treats a missing state log as a change', async () => {
    const {updater, provider, reporter} = createUpdater({
      address: '203.0.113.5',
    });

    const result = await updater.run();

    expect(result.status).toBe('updated');
    expect(provider.updateRecord).toHaveBeenCalledTimes(1);
    expect(reporter.info).toHaveBeenCalledWith(
      'The last public IP address was not set.',
    );

    const content = await readFile(stateLogPath, 'utf8');

    expect(content.split('\n')).toHaveLength(2);
    expect(content.endsWith(' 203.0.113.5\n')).toBe(true);
  });

  it('updates records in configuration order', async () => {
    const {updater, provider} = createUpdater({
      domains: [
        {
          domain: 'example.com',
          records: [
            {name: '*.example.com', type: 'A'},
            {name: 'example.com', type: 'A'},
          ],
        },
        {
          domain: 'example.org',
          records: [{name: 'home.example.org', type: 'A'}],
        },
      ],
      recordMap: {
        'example.com': [
          {id: 'apex', name: 'example.com', type: 'A', data: '203.0.113.5'},
          {id: 'wild', name: '*.example.com', type: 'A', data: '203.0.113.5'},
        ],
        'example.org': [
          {
            id: 'home',
            name: 'home.example.org',
            type: 'A',
            data: '203.0.113.5',
          },
        ],
      },
    });

    await updater.run();

    expect(provider.updateRecord.mock.calls).toEqual([
      ['example.com', 'wild', '203.0.113.9'],
      ['example.com', 'apex', '203.0.113.9'],
      ['example.org', 'home', '203.0.113.9'],
    ]);
  });

  describe('fail fast', () => {
    const domains: DomainConfig[] = [
      {
        domain: 'example.com',
        records: [
          {name: 'a.example.com', type: 'A'},
          {name: 'b.example.com', type: 'A'},
        ],
      },
      {
        domain: 'example.org',
        records: [{name: 'c.example.org', type: 'A'}],
      },
    ];

    const recordMap = {
      'example.com': [
        {id: 'a', name: 'a.example.com', type: 'A', data: '203.0.113.5'},
        {id: 'b', name: 'b.example.com', type: 'A', data: '203.0.113.5'},
      ],
      'example.org': [
        {id: 'c', name: 'c.example.org', type: 'A', data: '203.0.113.5'},
      ],
    };

    it('stops at the first failed update and keeps the state log', async () => {
      await writeFile(stateLogPath, PREVIOUS_ENTRY);

      const {updater, provider} = createUpdater({domains, recordMap});

      provider.updateRecord.mockImplementation(async (_domain, id) => {
        if (id === 'b') {
          throw new Error('500 Internal Server Error');
        }
      });

      await expect(updater.run()).rejects.toBeInstanceOf(
        ProviderUnavailableError,
      );

      expect(provider.listRecords).toHaveBeenCalledTimes(2);
      expect(provider.updateRecord).toHaveBeenCalledTimes(2);
      expect(await readFile(stateLogPath, 'utf8')).toBe(PREVIOUS_ENTRY);
    });

    it('stops at the first missing record', async () => {
      await writeFile(stateLogPath, PREVIOUS_ENTRY);

      const {updater, provider} = createUpdater({
        domains,
        recordMap: {...recordMap, 'example.com': [recordMap['example.com'][0]]},
      });

      await expect(updater.run()).rejects.toBeInstanceOf(RecordNotFoundError);

      expect(provider.updateRecord).toHaveBeenCalledTimes(1);
      expect(provider.updateRecord).toHaveBeenCalledWith(
        'example.com',
        'a',
        '203.0.113.9',
      );
      expect(await readFile(stateLogPath, 'utf8')).toBe(PREVIOUS_ENTRY);
    });
  });

  it('makes no provider calls when detection fails', async () => {
    const {updater, detector, provider} = createUpdater();

    detector.detect.mockRejectedValueOnce(
      new DetectionError('Invalid public IPv4 address: 192.168.1.500'),
    );

    await expect(updater.run()).rejects.toThrow(
      'Invalid public IPv4 address: 192.168.1.500',
    );

    expect(provider.listRecords).not.toHaveBeenCalled();
  });
});
