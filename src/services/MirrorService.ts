/**
 * Mirror Service
 *
 * Mirrors FTPS directories to local disk with lftp in two phases:
 * 1. Count the remote subdirectories of the link's path
 * 2. Mirror the path into <downloadRoot>/<last path segment>, then compare the
 *    local subdirectory count with the remote one
 *
 * lftp's own --continue/--only-newer options make re-runs resume instead of
 * starting over; nothing already on disk is removed.
 */

import * as path from 'path';
import { ExternalToolError, describeError } from '../types/errors';
import { FileHelpers } from '../utils/file-helpers';
import { Logger, LogSink } from '../utils/logger';
import { CommandRunner, runCommand } from './CommandRunner';

export type MirrorStatus = 'Success' | 'Failed' | 'Timeout' | 'Error';

export interface MirrorResult {
  url: string;
  status: MirrorStatus;
  output: string;
  localPath: string;
  remoteDirCount: number;
  localDirCount: number;
}

export interface MirrorOptions {
  lftpPath: string;
  listTimeoutMs: number;
  mirrorTimeoutMs: number;
  parallelSegments: number;
}

export const DEFAULT_MIRROR_OPTIONS: MirrorOptions = {
  lftpPath: 'lftp',
  listTimeoutMs: 120 * 1000,
  mirrorTimeoutMs: 10000 * 1000,
  parallelSegments: 4,
};

// Returned by getRemoteDirectoryCount when the listing failed
export const UNKNOWN_COUNT = -1;

export interface FtpsLocation {
  host: string;
  remotePath: string;
}

export function parseFtpsUrl(url: string): FtpsLocation {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ExternalToolError('lftp', `Not a valid FTPS URL: ${url}`);
  }
  if (parsed.protocol !== 'ftps:' || !parsed.hostname) {
    throw new ExternalToolError('lftp', `Not a valid FTPS URL: ${url}`);
  }
  return {
    host: parsed.port ? `${parsed.hostname}:${parsed.port}` : parsed.hostname,
    remotePath: decodeURIComponent(parsed.pathname || '/'),
  };
}

/**
 * Local directory name for a remote path: its last non-empty segment
 */
export function localTargetDirName(remotePath: string): string {
  if (remotePath === '/' || remotePath === '') {
    return 'ftps_root';
  }
  const segments = remotePath.split('/').filter(segment => segment.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : 'unknown_target_dir';
}

/**
 * Directory entries of a `cls -1 -F` listing (entries ending in '/')
 */
export function parseDirectoryListing(stdout: string): string[] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && line.endsWith('/'));
}

function lftpScript(host: string, command: string): string {
  return `set ssl:check-hostname no; open ftps://${host}; ${command}; bye`;
}

export function buildListArgs(location: FtpsLocation): string[] {
  return ['-e', lftpScript(location.host, `cls -1 -F "${location.remotePath}"`)];
}

export function buildMirrorArgs(location: FtpsLocation, parallelSegments: number): string[] {
  return [
    '-e',
    lftpScript(
      location.host,
      `mirror --use-pget-n=${parallelSegments} --only-newer --continue --verbose "${location.remotePath}" .`
    ),
  ];
}

export class MirrorService {
  private options: MirrorOptions;
  private runner: CommandRunner;
  private logger: LogSink;

  constructor(
    options: Partial<MirrorOptions> = {},
    runner: CommandRunner = runCommand,
    logger: LogSink = new Logger('MirrorService')
  ) {
    this.options = { ...DEFAULT_MIRROR_OPTIONS, ...options };
    this.runner = runner;
    this.logger = logger;
  }

  /**
   * Phase 1: number of subdirectories under the link's remote path,
   * or UNKNOWN_COUNT when the listing fails
   */
  async getRemoteDirectoryCount(url: string): Promise<number> {
    let location: FtpsLocation;
    try {
      location = parseFtpsUrl(url);
    } catch (error) {
      this.logger.error(`Phase 1: Skipping unusable link ${url}`, error);
      return UNKNOWN_COUNT;
    }
    this.logger.info(`Phase 1: Fetching remote directory count for ${url}`);

    const result = await this.runner(this.options.lftpPath, buildListArgs(location), {
      timeoutMs: this.options.listTimeoutMs,
    });

    if (result.timedOut) {
      this.logger.error(`Phase 1: Timeout while listing ${location.remotePath}`);
      return UNKNOWN_COUNT;
    }
    if (result.code !== 0) {
      this.logger.error(`Phase 1: Failed to list ${location.remotePath}: ${result.stderr.trim()}`);
      return UNKNOWN_COUNT;
    }

    this.logger.debug(`Phase 1: Raw listing for ${location.remotePath}:\n${result.stdout.trim()}`);
    const count = parseDirectoryListing(result.stdout).length;
    this.logger.info(`Phase 1: ${location.remotePath} contains ${count} directories`);
    return count;
  }

  /**
   * Phase 2: mirror one link and verify the local directory count
   */
  async mirror(url: string, downloadRoot: string, expectedRemoteDirCount: number): Promise<MirrorResult> {
    const location = parseFtpsUrl(url);
    const localPath = path.join(downloadRoot, localTargetDirName(location.remotePath));
    FileHelpers.ensureDirectory(localPath);

    const base = { url, localPath, remoteDirCount: expectedRemoteDirCount };
    this.logger.info(`Phase 2: Mirroring ${url} into ${localPath}`);

    let output: string;
    try {
      const result = await this.runner(
        this.options.lftpPath,
        buildMirrorArgs(location, this.options.parallelSegments),
        { cwd: localPath, timeoutMs: this.options.mirrorTimeoutMs }
      );

      if (result.timedOut) {
        this.logger.error(`Phase 2: Timeout (${this.options.mirrorTimeoutMs / 1000}s) expired while mirroring ${url}`);
        return { ...base, status: 'Timeout', output: result.stderr.trim(), localDirCount: this.countLocal(localPath) };
      }
      if (result.code !== 0) {
        this.logger.error(`Phase 2: Failed to mirror ${url}: ${result.stderr.trim()}`);
        return { ...base, status: 'Failed', output: result.stderr.trim(), localDirCount: this.countLocal(localPath) };
      }
      output = result.stdout.trim();
    } catch (error) {
      // A missing lftp binary is fatal for the whole run
      if (error instanceof ExternalToolError) {
        throw error;
      }
      this.logger.error(`Phase 2: Unexpected error while mirroring ${url}`, error);
      return { ...base, status: 'Error', output: describeError(error), localDirCount: this.countLocal(localPath) };
    }

    this.logger.info(`Phase 2: Mirrored ${url} to ${localPath}`);
    const localDirCount = this.countLocal(localPath);
    this.logger.info(`Phase 2: ${localPath} contains ${localDirCount} sub-directories`);

    if (expectedRemoteDirCount === UNKNOWN_COUNT) {
      this.logger.warn(`Phase 2: Remote directory count unknown for ${url}; local count is ${localDirCount}`);
    } else if (localDirCount !== expectedRemoteDirCount) {
      this.logger.warn(
        `Phase 2: Directory count mismatch for ${url}: remote ${expectedRemoteDirCount}, local ${localDirCount}`
      );
    } else {
      this.logger.info(`Phase 2: Directory count matches for ${url}: ${localDirCount}`);
    }

    return { ...base, status: 'Success', output, localDirCount };
  }

  private countLocal(localPath: string): number {
    return FileHelpers.countSubdirectories(localPath);
  }
}
