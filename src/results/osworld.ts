/**
 * Reads OSWorld per-task scores into a flat metric mapping.
 */

import { readFile, readdir } from 'fs/promises';
import path from 'path';
import { NoopLogger } from '../observability/index.js';
import type { ParseOptions } from './aiperf.js';

const RESULT_FILE = 'result.txt';
const TRAJECTORY_FILE = 'traj.jsonl';

/**
 * Parses every `result.txt` under `resultDir` (recursively).
 *
 * A task counts as successful when its score is above zero. With no result
 * files, reports `partial_results` as the number of trajectory files found.
 */
export async function parseOsworldResults(
  resultDir: string,
  options: ParseOptions = {}
): Promise<Record<string, number>> {
  const logger = options.logger ?? new NoopLogger();
  const metrics: Record<string, number> = {};

  let files: string[];
  try {
    files = await readdir(resultDir, { recursive: true });
  } catch (error) {
    logger.warn('Cannot read OSWorld result directory', {
      resultDir,
      error: error instanceof Error ? error.message : String(error),
    });
    return metrics;
  }

  const resultFiles = files.filter((file) => path.basename(file) === RESULT_FILE).sort();

  if (resultFiles.length === 0) {
    const trajectories = files.filter((file) => path.basename(file) === TRAJECTORY_FILE);
    logger.warn(`No ${RESULT_FILE} files found`, { resultDir, trajectories: trajectories.length });
    if (trajectories.length > 0) {
      metrics.partial_results = trajectories.length;
    }
    return metrics;
  }

  let totalTasks = 0;
  let successfulTasks = 0;
  let totalScore = 0;
  let failedParses = 0;

  for (const relative of resultFiles) {
    const file = path.join(resultDir, relative);
    let content: string;
    try {
      content = (await readFile(file, 'utf8')).trim();
    } catch (error) {
      logger.warn('Failed to read result file', {
        file,
        error: error instanceof Error ? error.message : String(error),
      });
      failedParses++;
      continue;
    }

    if (!content) {
      logger.warn('Empty result file', { file });
      failedParses++;
      continue;
    }

    const score = Number(content);
    if (isNaN(score)) {
      logger.warn('Invalid score in result file', { file, content: content.slice(0, 64) });
      failedParses++;
      continue;
    }

    totalTasks++;
    totalScore += score;
    if (score > 0) {
      successfulTasks++;
    }
  }

  if (totalTasks > 0) {
    metrics.success_rate = (successfulTasks / totalTasks) * 100;
    metrics.average_score = totalScore / totalTasks;
    metrics.total_tasks = totalTasks;
    metrics.successful_tasks = successfulTasks;
    metrics.failed_tasks = totalTasks - successfulTasks;
    if (failedParses > 0) {
      metrics.parse_errors = failedParses;
    }
  }

  return metrics;
}
