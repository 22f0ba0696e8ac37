import { Injectable, Logger } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import { ConfigService } from '../config/config.service';
import { describeError, errorMessage } from '../types/error-taxonomy';
import { Snapshot, freezeSnapshot } from '../types/snapshot';
import { snapshotSchema } from './snapshot.schema';

/**
 * Persists the newest snapshot to a single JSON file.
 *
 * Neither method throws: a missing or damaged file means "no baseline",
 * and a failed write leaves the in-memory state authoritative until the
 * next refresh overwrites the file again. Writes are not atomic.
 */
@Injectable()
export class StateFileService {
  private readonly logger = new Logger(StateFileService.name);
  private readonly path: string | null;

  constructor(config: ConfigService) {
    this.path = config.stateFile;
  }

  get enabled(): boolean {
    return this.path !== null;
  }

  async load(): Promise<Snapshot | undefined> {
    if (this.path === null) {
      this.logger.log('Persistence disabled (STATE_FILE is empty)');
      return undefined;
    }

    this.logger.log(`Reading previous persisted state from file ${this.path}`);

    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.log(describeError('STATE_NOT_FOUND', this.path));
      } else {
        this.logger.warn(describeError('STATE_READ_FAILED', errorMessage(error)));
      }
      return undefined;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      this.logger.warn(describeError('STATE_PARSE_FAILED', errorMessage(error)));
      return undefined;
    }

    const result = snapshotSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.errors
        .map((err) => `${err.path.join('.') || '<root>'}: ${err.message}`)
        .join('; ');
      this.logger.warn(describeError('STATE_INVALID', issues));
      return undefined;
    }

    if (Object.keys(result.data).length === 0) {
      this.logger.log(`Persisted state in ${this.path} is empty, ignoring it`);
      return undefined;
    }

    return freezeSnapshot(result.data);
  }

  /**
   * Overwrite the state file with the snapshot.
   * @returns false when persistence is disabled or the write failed
   */
  async save(snapshot: Snapshot): Promise<boolean> {
    if (this.path === null) {
      return false;
    }

    try {
      await writeFile(this.path, JSON.stringify(snapshot), 'utf8');
      return true;
    } catch (error) {
      this.logger.error(describeError('STATE_WRITE_FAILED', errorMessage(error)));
      return false;
    }
  }
}

// fs errors may come from another realm (e.g. a test sandbox), so match the shape
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
