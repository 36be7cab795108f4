// src/tests/download.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { buildProgram, DownloadCliOptions, OrchestratorFactory, runDownload } from '../cli/download';
import { CommandOptions, CommandResult } from '../services/CommandRunner';
import { DownloadOrchestrator } from '../services/DownloadOrchestrator';
import { LinkSource } from '../services/LinkDiscoveryService';
import { MirrorService } from '../services/MirrorService';
import { createMockSink, makeTempDir } from './helpers';

const LINKS = ['ftps://data.example.org/pub/114/A', 'ftps://data.example.org/pub/114/B'];

/**
 * Orchestrator over a fixed link list whose fake lftp fails the mirror of
 * every remote path listed in `failing`
 */
function factoryFor(failing: string[], links: LinkSource = { discover: async () => LINKS }) {
  const runner = jest.fn(async (_command: string, args: string[], options?: CommandOptions): Promise<CommandResult> => {
    const script = args[1];
    if (script.includes('cls -1 -F')) {
      return { code: 0, signal: null, stdout: 'd1/\n', stderr: '', timedOut: false };
    }
    const remotePath = /"([^"]+)"/.exec(script)?.[1] ?? '';
    if (failing.includes(remotePath)) {
      return { code: 1, signal: null, stdout: '', stderr: 'Access failed', timedOut: false };
    }
    fs.mkdirSync(path.join(options?.cwd ?? '', 'd1'), { recursive: true });
    return { code: 0, signal: null, stdout: 'done', stderr: '', timedOut: false };
  });

  const factory = jest.fn<DownloadOrchestrator, Parameters<OrchestratorFactory>>(
    () => new DownloadOrchestrator(links, new MirrorService({}, runner, createMockSink()), createMockSink())
  );
  return { factory, runner };
}

describe('runDownload', () => {
  let tempDir: string;
  let output: string;

  beforeEach(() => {
    tempDir = makeTempDir('download-cli-');
    output = path.join(tempDir, '114');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should exit 0 when some links mirrored and warn about the rest', async () => {
    const { factory } = factoryFor(['/pub/114/B']);
    const sink = createMockSink();

    await expect(runDownload({ year: '114', output }, factory, sink, {})).resolves.toBe(0);
    expect(sink.warn).toHaveBeenCalledWith(`1 of 2 link(s) failed; partial data kept in ${output}`);
    expect(fs.existsSync(path.join(output, 'A', 'd1'))).toBe(true);
  });

  it('should hand the environment and options to the factory', async () => {
    const { factory } = factoryFor([]);
    const cli: DownloadCliOptions = { year: '114', output, sourceUrl: 'https://opendata.example.org/list' };

    await runDownload(cli, factory, createMockSink(), { LFTP_PATH: '/opt/bin/lftp' });

    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ lftpPath: '/opt/bin/lftp', pageSettleMs: 3000 }), cli);
  });

  it('should exit 1 when every link failed', async () => {
    const { factory } = factoryFor(['/pub/114/A', '/pub/114/B']);
    const sink = createMockSink();

    await expect(runDownload({ year: '114', output }, factory, sink, {})).resolves.toBe(1);
    expect(sink.error).toHaveBeenCalledWith('All 2 link(s) failed to mirror for year 114');
  });

  it('should exit 1 on a bad environment before building anything', async () => {
    const { factory } = factoryFor([]);
    const sink = createMockSink();

    await expect(runDownload({ year: '114', output }, factory, sink, { PAGE_SETTLE_MS: 'later' })).resolves.toBe(1);
    expect(factory).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledWith('PAGE_SETTLE_MS must be a non-negative integer, got "later"');
  });

  it('should rethrow errors that are not harvester errors', async () => {
    const { factory } = factoryFor([], { discover: async () => Promise.reject(new TypeError('boom')) });

    await expect(runDownload({ year: '114', output }, factory, createMockSink(), {})).rejects.toThrow('boom');
  });
});

describe('download program', () => {
  it('should parse the year and output', () => {
    const program = buildProgram().parse(['node', 'download', '--year', '113', '-o', '/data/113'], { from: 'node' });

    expect(program.opts<DownloadCliOptions>()).toEqual({ year: '113', output: '/data/113' });
  });
});
