import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PersistenceError } from '@taskfit/core';
import type { ModelArtifact, ProgressTable } from '@taskfit/core';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  mkdir: vi.fn(),
  rename: vi.fn(),
  rm: vi.fn(),
}));

import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { FileProgressStore } from '../stores/file-progress-store.js';
import { FileModelStore } from '../stores/file-model-store.js';

const mockedReadFile = vi.mocked(readFile);
const mockedWriteFile = vi.mocked(writeFile);
const mockedRename = vi.mocked(rename);
const mockedRm = vi.mocked(rm);

const table: ProgressTable = {
  '1_1': {
    taskId: 1,
    userId: 1,
    userName: 'Ava',
    taskType: 'Design',
    complexity: 0.5,
    deadline: 10,
    status: 'in_progress',
    startTime: '2025-06-01T12:00:00.000Z',
    updates: [{ timestamp: '2025-06-01T13:00:00.000Z', progressPercent: 40, notes: '' }],
    completionTime: null,
  },
};

const artifact: ModelArtifact = {
  version: 1,
  algorithm: 'random-forest',
  trainedAt: '2025-06-01T12:00:00.000Z',
  sampleCount: 1,
  payload: { trees: [] },
};

beforeEach(() => {
  vi.clearAllMocks();
  mockedReadFile.mockRejectedValue(Object.assign(new Error('ENOENT'), { code: 'ENOENT' }));
  mockedWriteFile.mockResolvedValue(undefined);
  vi.mocked(mkdir).mockResolvedValue(undefined);
  mockedRename.mockResolvedValue(undefined);
  mockedRm.mockResolvedValue(undefined);
});

describe('FileProgressStore', () => {
  it('loads an empty table when the file is missing', async () => {
    expect(await new FileProgressStore('/data').load()).toEqual({});
  });

  it('loads a stored table', async () => {
    mockedReadFile.mockResolvedValueOnce(JSON.stringify(table));
    expect(await new FileProgressStore('/data').load()).toEqual(table);
  });

  it('rejects records with an unknown status', async () => {
    const bad = { '1_1': { ...table['1_1'], status: 'paused' } };
    mockedReadFile.mockResolvedValueOnce(JSON.stringify(bad));
    await expect(new FileProgressStore('/data').load()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('rewrites the whole table atomically', async () => {
    await new FileProgressStore('/data').save(table);

    const [tempPath, body] = mockedWriteFile.mock.calls[0];
    expect(JSON.parse(String(body))).toEqual(table);
    expect(mockedRename).toHaveBeenCalledWith(tempPath, '/data/progress.json');
  });

  it('surfaces read failures other than a missing file', async () => {
    mockedReadFile.mockRejectedValueOnce(Object.assign(new Error('EACCES'), { code: 'EACCES' }));
    await expect(new FileProgressStore('/data').load()).rejects.toThrow(
      'Failed to read /data/progress.json: EACCES',
    );
  });
});

describe('FileModelStore', () => {
  it('returns null when no model was saved', async () => {
    expect(await new FileModelStore('/data').load()).toBeNull();
  });

  it('round-trips the artifact through model.json', async () => {
    const store = new FileModelStore('/data');
    await store.save(artifact);

    const [tempPath, body] = mockedWriteFile.mock.calls[0];
    expect(mockedRename).toHaveBeenCalledWith(tempPath, '/data/model.json');

    mockedReadFile.mockResolvedValueOnce(String(body));
    expect(await store.load()).toEqual(artifact);
  });

  it('deletes the artifact on clear', async () => {
    await new FileModelStore('/data').clear();
    expect(mockedRm).toHaveBeenCalledWith('/data/model.json', { force: true });
  });
});
