import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilesystemObjectStorage, type StorageProvider } from '@carecomply/storage';
import { DEFAULT_SUMMARY_LOCATION } from './summary-path.js';
import { listComplianceFiles, readComplianceSummary } from './summary-reader.js';

const NOW = new Date('2026-10-18T09:00:00.000Z');
const USER_PATH = 'compliance-results/2026/10/user_42/compliance_summary.csv';
const ORG_PATH = 'compliance-results/2026/10/org_7/user_42/compliance_summary.csv';
const CSV = 'Framework,Compliance_Score,Status\nAged Care,53.5,Missing\nNDIS,30.3,Missing\nOverall,41.5,\n';

describe('summary-reader', () => {
  let storage: FilesystemObjectStorage;
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'carecomply-summary-test-'));
    storage = new FilesystemObjectStorage(testDir);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('readComplianceSummary', () => {
    it('reads and normalizes the current month summary', async () => {
      await storage.put(USER_PATH, Buffer.from(CSV), 'text/csv');

      const result = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result.state).toBe('READY');
      if (result.state !== 'READY') return;
      expect(result.summary.frameworks.map((f) => f.name)).toEqual(['Aged Care', 'NDIS']);
      expect(result.summary.overallScorePercent).toBe(41.5);
      expect(result.summary.sourceIdentifier).toBe(USER_PATH);
      expect(result.summary.fetchedAt).toBe('2026-10-18T09:00:00.000Z');
    });

    it('prefers the organisation-scoped file', async () => {
      await storage.put(USER_PATH, Buffer.from(CSV), 'text/csv');
      await storage.put(ORG_PATH, Buffer.from('Framework,Compliance_Score,Status\nNDIS,90,Complete\n'), 'text/csv');

      const result = await readComplianceSummary(
        storage,
        DEFAULT_SUMMARY_LOCATION,
        { userId: '42', organizationId: '7' },
        { now: NOW }
      );

      expect(result.state).toBe('READY');
      if (result.state !== 'READY') return;
      expect(result.summary.sourceIdentifier).toBe(ORG_PATH);
      expect(result.summary.overallScorePercent).toBe(90);
    });

    it('returns an empty NO_DATA summary when nothing has been written', async () => {
      const result = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result).toEqual({
        state: 'NO_DATA',
        reason: 'NOT_FOUND',
        summary: {
          frameworks: [],
          overallScorePercent: undefined,
          overallScoreSource: 'NONE',
          sourceIdentifier: USER_PATH,
          fetchedAt: '2026-10-18T09:00:00.000Z',
        },
      });
    });

    it('does not read last month', async () => {
      await storage.put(
        'compliance-results/2026/09/user_42/compliance_summary.csv',
        Buffer.from(CSV),
        'text/csv'
      );

      const result = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result.state).toBe('NO_DATA');
    });

    it('reports FETCH_FAILED when storage errors', async () => {
      const failing: StorageProvider = {
        put: vi.fn(),
        get: vi.fn().mockRejectedValue(new Error('connection reset')),
        exists: vi.fn(),
        delete: vi.fn(),
        list: vi.fn(),
        describe: () => 'failing',
      };

      const result = await readComplianceSummary(failing, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result.state).toBe('NO_DATA');
      if (result.state !== 'NO_DATA') return;
      expect(result.reason).toBe('FETCH_FAILED');
      expect(result.summary.frameworks).toEqual([]);
      expect(failing.get).toHaveBeenCalledTimes(1);
    });

    it('reports FORMAT_UNRECOGNIZED for a file missing required columns', async () => {
      await storage.put(USER_PATH, Buffer.from('Framework,Status\nNDIS,Missing\n'), 'text/csv');

      const result = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result).toEqual({
        state: 'FORMAT_UNRECOGNIZED',
        errorCode: 'SCHEMA_MISMATCH',
        message: 'Compliance file is missing required columns: Compliance_Score',
        sourceIdentifier: USER_PATH,
        fetchedAt: '2026-10-18T09:00:00.000Z',
      });
    });

    it('reports FORMAT_UNRECOGNIZED for undecodable bytes', async () => {
      await storage.put(USER_PATH, Buffer.from([0xff, 0xfe, 0x00]), 'text/csv');

      const result = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(result.state).toBe('FORMAT_UNRECOGNIZED');
      if (result.state !== 'FORMAT_UNRECOGNIZED') return;
      expect(result.errorCode).toBe('MALFORMED_INPUT');
    });

    it('re-reads storage on every call', async () => {
      await storage.put(USER_PATH, Buffer.from(CSV), 'text/csv');
      const first = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      await storage.put(USER_PATH, Buffer.from('Framework,Compliance_Score,Status\nNDIS,12,Missing\n'), 'text/csv');
      const second = await readComplianceSummary(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, { now: NOW });

      expect(first.state === 'READY' && first.summary.overallScorePercent).toBe(41.5);
      expect(second.state === 'READY' && second.summary.overallScorePercent).toBe(12);
    });
  });

  describe('listComplianceFiles', () => {
    it('lists CSV files for the month, newest first, with labels', async () => {
      const older = await storage.put(
        'compliance-results/2026/10/user_42/frameworks_detail.csv',
        Buffer.from('x'),
        'text/csv'
      );
      const newer = await storage.put(USER_PATH, Buffer.from('xy'), 'text/csv');
      await storage.put('compliance-results/2026/10/user_42/notes.txt', Buffer.from('n'), 'text/plain');
      await fs.utimes(older.storagePath, new Date('2026-10-01T00:00:00Z'), new Date('2026-10-01T00:00:00Z'));
      await fs.utimes(newer.storagePath, new Date('2026-10-02T00:00:00Z'), new Date('2026-10-02T00:00:00Z'));

      const { files, reason } = await listComplianceFiles(
        storage,
        DEFAULT_SUMMARY_LOCATION,
        { userId: '42' },
        NOW
      );

      expect(reason).toBeUndefined();
      expect(files).toEqual([
        {
          fileName: 'compliance_summary.csv',
          path: USER_PATH,
          label: 'Compliance Summary',
          sizeBytes: 2,
          lastModified: '2026-10-02T00:00:00.000Z',
        },
        {
          fileName: 'frameworks_detail.csv',
          path: 'compliance-results/2026/10/user_42/frameworks_detail.csv',
          label: 'Multiple Frameworks',
          sizeBytes: 1,
          lastModified: '2026-10-01T00:00:00.000Z',
        },
      ]);
    });

    it('stops at the first directory holding files', async () => {
      await storage.put(USER_PATH, Buffer.from(CSV), 'text/csv');
      await storage.put(ORG_PATH, Buffer.from(CSV), 'text/csv');

      const { files } = await listComplianceFiles(
        storage,
        DEFAULT_SUMMARY_LOCATION,
        { userId: '42', organizationId: '7' },
        NOW
      );

      expect(files.map((file) => file.path)).toEqual([ORG_PATH]);
    });

    it('returns an empty list when there is nothing for the month', async () => {
      const listing = await listComplianceFiles(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, NOW);

      expect(listing).toEqual({ files: [], reason: 'NOT_FOUND' });
    });

    it('returns an empty listing when storage cannot be listed', async () => {
      vi.spyOn(storage, 'list').mockRejectedValue(new Error('connection reset'));

      const listing = await listComplianceFiles(storage, DEFAULT_SUMMARY_LOCATION, { userId: '42' }, NOW);

      expect(listing).toEqual({ files: [], reason: 'FETCH_FAILED' });
      expect(console.error).toHaveBeenCalledWith(
        '[SUMMARY] Failed to list compliance-results/2026/10/user_42:',
        expect.any(Error)
      );
    });
  });
});
