/**
 * Artifact Retriever
 *
 * Results of mediated operations come back one of two ways: as a workflow
 * artifact (Actions artifact API) or as a file committed to the `logs`
 * branch. Both are keyed by the same identity string.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import AdmZip from 'adm-zip';
import { artifactListSchema, type Artifact } from '@bridgeline/shared';
import { delay, throwIfAborted, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { ForgeError, TimeoutError } from './errors.js';
import type { ForgeSession } from './session.js';

const logger = createLogger('forge:artifacts');

export const LOGS_BRANCH = 'logs';
export const OUTPUT_LOG_NAME = 'output.log';

export function logArtifactName(jobId: string, requestId: string): string {
  return `job-${jobId}-log-${requestId}`;
}

export function bridgeArtifactName(requestId: string): string {
  return `bridge-action-${requestId}`;
}

export interface ArtifactRetrieverOptions {
  pollIntervalMs?: number;
  minTimeoutMs?: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * First non-directory entry of a zip archive, or null.
 */
function firstFileEntry(data: Uint8Array): Buffer | null {
  let zip: AdmZip;
  try {
    zip = new AdmZip(Buffer.from(data));
  } catch (error) {
    logger.warn({ err: error, bytes: data.length }, 'Artifact download is not a readable zip');
    return null;
  }
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) continue;
    return entry.getData();
  }
  return null;
}

export class ArtifactRetriever {
  private readonly pollIntervalMs: number;
  private readonly minTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly session: ForgeSession,
    options: ArtifactRetrieverOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 3000;
    this.minTimeoutMs = options.minTimeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Non-expired artifact with the given name. API failures read as "none".
   */
  async findArtifactByName(name: string): Promise<Artifact | null> {
    const url = `${this.session.apiBase}/artifacts?limit=100`;
    try {
      const body = await this.session.client.requestJSON('GET', url);
      const parsed = artifactListSchema.safeParse(body);
      if (!parsed.success) {
        logger.debug({ url, issues: parsed.error.issues }, 'Unexpected artifact list response');
        return null;
      }
      return parsed.data.artifacts.find((artifact) => artifact.name === name && !artifact.expired) ?? null;
    } catch (error) {
      if (!(error instanceof ForgeError)) throw error;
      logger.debug({ err: error, name }, 'Artifact lookup failed');
      return null;
    }
  }

  /**
   * Poll until the log for (jobId, requestId) is published, then write it to
   * `destPath`. Tries the artifact API first and the logs branch second.
   */
  async waitForLogArtifact(
    jobId: string,
    requestId: string,
    destPath: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    const name = logArtifactName(jobId, requestId);
    const budget = Math.max(this.minTimeoutMs, timeoutMs);
    const startTime = this.now();

    for (;;) {
      throwIfAborted(signal);
      if (this.now() - startTime > budget) {
        throw new TimeoutError(
          `Remote log retrieval timed out after ${Math.round(budget / 1000)} seconds`,
          name,
          budget
        );
      }

      if (await this.tryArtifactApi(name, destPath)) return;
      if (await this.tryLogsBranch(name, destPath)) return;

      await this.sleep(this.pollIntervalMs, signal);
    }
  }

  /**
   * Download `bridge-action-<requestId>.zip` from the logs branch and extract
   * it into `localDir`.
   */
  async downloadBridgeArtifact(requestId: string, localDir: string): Promise<string[]> {
    const name = bridgeArtifactName(requestId);
    const data = await this.fetchBridgeZip(requestId);
    if (!data) {
      throw new ForgeError(`Artifact not found: ${name}`);
    }

    const root = resolve(localDir);
    await mkdir(root, { recursive: true });

    const written: string[] = [];
    const zip = new AdmZip(Buffer.from(data));
    for (const entry of zip.getEntries()) {
      const target = resolve(root, entry.entryName);
      if (target !== root && !target.startsWith(root + sep)) {
        throw new ForgeError(`Refusing to extract ${entry.entryName} outside ${root}`);
      }
      if (entry.isDirectory) {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, entry.getData());
      written.push(target);
    }

    logger.debug({ requestId, localDir: root, files: written.length }, 'Extracted bridge artifact');
    return written;
  }

  /**
   * Captured stdout/stderr of a bridge action, or null when unavailable.
   */
  async fetchBridgeOutputLog(requestId: string): Promise<string | null> {
    const data = await this.fetchBridgeZip(requestId);
    if (!data) return null;

    try {
      const zip = new AdmZip(Buffer.from(data));
      const entry = zip
        .getEntries()
        .find(
          (candidate) =>
            !candidate.isDirectory &&
            (candidate.entryName === OUTPUT_LOG_NAME || candidate.entryName.endsWith(`/${OUTPUT_LOG_NAME}`))
        );
      return entry ? entry.getData().toString('utf-8') : null;
    } catch (error) {
      logger.warn({ err: error, requestId }, 'Bridge artifact is not a readable zip');
      return null;
    }
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async fetchBridgeZip(requestId: string): Promise<Uint8Array | null> {
    const url = this.session.rawFileUrl(LOGS_BRANCH, `${bridgeArtifactName(requestId)}.zip`);
    try {
      const data = await this.session.client.requestBytes('GET', url);
      return data.length > 0 ? data : null;
    } catch (error) {
      if (!(error instanceof ForgeError)) throw error;
      logger.debug({ err: error, requestId }, 'Bridge artifact not available');
      return null;
    }
  }

  private async tryArtifactApi(name: string, destPath: string): Promise<boolean> {
    const artifact = await this.findArtifactByName(name);
    if (!artifact) return false;

    const url = `${this.session.apiBase}/artifacts/${artifact.id}/zip`;
    try {
      const data = await this.session.client.requestBytes('GET', url);
      const content = firstFileEntry(data);
      if (!content) return false;
      await mkdir(dirname(destPath), { recursive: true });
      await writeFile(destPath, content);
      logger.debug({ name, bytes: content.length }, 'Log fetched via artifact API');
      return true;
    } catch (error) {
      if (error instanceof ForgeError) {
        logger.debug({ err: error, name }, 'Artifact download failed, trying logs branch');
        return false;
      }
      throw error;
    }
  }

  private async tryLogsBranch(name: string, destPath: string): Promise<boolean> {
    const url = this.session.rawFileUrl(LOGS_BRANCH, `${name}.log`);
    try {
      const data = await this.session.client.requestBytes('GET', url);
      if (data.length === 0) return false;
      await mkdir(dirname(destPath), { recursive: true });
      await writeFile(destPath, data);
      logger.debug({ name, bytes: data.length }, 'Log fetched from logs branch');
      return true;
    } catch (error) {
      if (error instanceof ForgeError) return false;
      throw error;
    }
  }
}
