import { copyInto, ensureDir, fileExists, listSorted, writeJson } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { agentOutputPath, runPaths, type RunPaths } from '../../workspace/layout.js';
import type { AgentOutput } from '../execution/types.js';
import type { RelayDocument } from '../relay.js';
import { captureEnvironment, type HostEnvironment } from './environment.js';

export interface LoggerRecord {
  timestamp: string;
  run_dir: string;
  /** Entries of the run directory at the time of logging, sorted, dotfiles excluded. */
  files_present: string[];
  environment?: HostEnvironment;
}

export interface RunRecorderOptions {
  logger?: Logger;
  clock?: () => Date;
  captureEnvironment?: () => Promise<HostEnvironment>;
}

/**
 * Writes a run's artifacts into its run directory.
 *
 * Writes go straight to their final path; a reader scanning the vault concurrently may see
 * a run directory that is only partly written.
 */
export class RunRecorder {
  readonly paths: RunPaths;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly capture: () => Promise<HostEnvironment>;

  constructor(runDir: string, opts: RunRecorderOptions = {}) {
    this.paths = runPaths(runDir);
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? (() => new Date());
    this.capture = opts.captureEnvironment ?? (() => captureEnvironment());
  }

  /**
   * One file per agent under `outputs/`. Names that sanitize to a file already written this
   * call get a `_2`, `_3`, ... suffix.
   */
  async writeAgentOutputs(outputs: Readonly<Record<string, AgentOutput>>): Promise<string[]> {
    await ensureDir(this.paths.outputsDir);
    const written: string[] = [];
    for (const [name, output] of Object.entries(outputs)) {
      let path = agentOutputPath(this.paths.runDir, name);
      for (let n = 2; written.includes(path); n++) {
        path = agentOutputPath(this.paths.runDir, `${name}_${n}`);
      }
      if (path !== agentOutputPath(this.paths.runDir, name)) {
        this.logger.warn('agent output file name already taken', { agent: name, path });
      }
      await writeJson(path, output);
      written.push(path);
    }
    this.logger.debug('agent outputs written', { count: written.length });
    return written;
  }

  async writeRelay(doc: RelayDocument): Promise<string> {
    await writeJson(this.paths.relayPath, doc);
    return this.paths.relayPath;
  }

  /**
   * Copy the rubric schema the run was scored with. Returns null (and warns) when there is none.
   */
  async snapshotRubric(rubricPath: string): Promise<string | null> {
    if (!(await fileExists(rubricPath))) {
      this.logger.warn('rubric schema not found; evaluation.json not written', { rubricPath });
      return null;
    }
    await copyInto(rubricPath, this.paths.evaluationPath);
    return this.paths.evaluationPath;
  }

  async writeLoggerRecord(opts: { recordEnv: boolean }): Promise<LoggerRecord> {
    await ensureDir(this.paths.runDir);
    const entries = await listSorted(this.paths.runDir);

    const record: LoggerRecord = {
      timestamp: this.clock().toISOString(),
      run_dir: this.paths.runDir,
      files_present: entries.filter((e) => !e.startsWith('.'))
    };
    if (opts.recordEnv) {
      record.environment = await this.capture();
    }

    await writeJson(this.paths.loggerPath, record);
    return record;
  }
}
