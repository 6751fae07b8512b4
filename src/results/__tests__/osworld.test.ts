import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { parseOsworldResults } from '../osworld.js';

async function writeTaskFile(root: string, relative: string, content: string): Promise<void> {
  const file = path.join(root, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content);
}

describe('parseOsworldResults', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'osworld-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should aggregate task scores recursively', async () => {
    await writeTaskFile(dir, 'chrome/task-1/result.txt', '1.0');
    await writeTaskFile(dir, 'chrome/task-2/result.txt', '0');
    await writeTaskFile(dir, 'gimp/nested/task-3/result.txt', '0.5\n');

    const metrics = await parseOsworldResults(dir);

    expect(metrics.success_rate).toBeCloseTo(66.667, 2);
    expect(metrics).toMatchObject({
      average_score: 0.5,
      total_tasks: 3,
      successful_tasks: 2,
      failed_tasks: 1,
    });
    expect(metrics).not.toHaveProperty('parse_errors');
  });

  it('should count unreadable scores as parse errors', async () => {
    await writeTaskFile(dir, 'task-1/result.txt', '1');
    await writeTaskFile(dir, 'task-2/result.txt', '');
    await writeTaskFile(dir, 'task-3/result.txt', 'oops');

    await expect(parseOsworldResults(dir)).resolves.toEqual({
      success_rate: 100,
      average_score: 1,
      total_tasks: 1,
      successful_tasks: 1,
      failed_tasks: 0,
      parse_errors: 2,
    });
  });

  it('should report partial results from trajectories', async () => {
    await writeTaskFile(dir, 'task-1/traj.jsonl', '{}\n');
    await writeTaskFile(dir, 'task-2/traj.jsonl', '{}\n');

    await expect(parseOsworldResults(dir)).resolves.toEqual({ partial_results: 2 });
  });

  it('should return nothing for an empty directory', async () => {
    await expect(parseOsworldResults(dir)).resolves.toEqual({});
  });

  it('should return nothing for a missing directory', async () => {
    await expect(parseOsworldResults(path.join(dir, 'missing'))).resolves.toEqual({});
  });
});
