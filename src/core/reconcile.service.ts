import * as path from 'path';
import type { Stats } from 'fs-extra';
import { FileSystemService } from './filesystem.service';
import { SymlinkService } from './symlink.service';
import { describeError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

/**
 * What was found at a tracked item's home location before processing
 */
export type SourceState = 'symlink' | 'directory' | 'file' | 'missing' | 'inaccessible';

/**
 * Read-only classification used by `status`
 */
export type ItemStatus = 'linked' | 'foreign-link' | 'pending' | 'restorable' | 'missing';

export interface ReconcileOptions {
  /** Only changes the wording of the log */
  isSync: boolean;
  dryRun?: boolean;
}

/**
 * Outcome of processing a single tracked item
 */
export interface ReconcileReport {
  item: string;
  sourcePath: string;
  destinationPath: string;
  state: SourceState;
  copied: boolean;
  removed: boolean;
  linked: boolean;
  errors: string[];
}

export interface ReconcileSummary {
  reports: ReconcileReport[];
  copied: number;
  linked: number;
  skipped: number;
  failed: number;
}

export interface ItemStatusReport {
  item: string;
  status: ItemStatus;
  sourcePath: string;
  destinationPath: string;
}

function classify(stats: Stats): SourceState {
  if (stats.isSymbolicLink()) {
    return 'symlink';
  }
  return stats.isDirectory() ? 'directory' : 'file';
}

/**
 * Moves tracked items from the home directory into the repository and
 * leaves symlinks behind.
 *
 * Every call re-reads the file system, so running it again over the same
 * items only acts on whatever is not yet linked. Failures are logged and
 * recorded on the report; nothing here throws.
 */
export class ReconcileService {
  private readonly homeDir: string;
  private readonly repositoryDir: string;
  private readonly fileSystem: FileSystemService;
  private readonly symlinkService: SymlinkService;

  constructor(
    homeDir: string,
    repositoryDir: string,
    fileSystem?: FileSystemService,
    symlinkService?: SymlinkService,
  ) {
    this.homeDir = path.resolve(homeDir);
    this.repositoryDir = path.resolve(repositoryDir);
    this.fileSystem = fileSystem || new FileSystemService();
    this.symlinkService = symlinkService || new SymlinkService(this.fileSystem);
  }

  /**
   * Process items one at a time, in order
   */
  public async processAll(
    items: readonly string[],
    options: ReconcileOptions,
  ): Promise<ReconcileSummary> {
    const reports: ReconcileReport[] = [];
    for (const item of items) {
      reports.push(await this.processPath(item, options));
    }

    return {
      reports,
      copied: reports.filter(report => report.copied).length,
      linked: reports.filter(report => report.linked).length,
      skipped: reports.filter(report => report.state === 'symlink').length,
      failed: reports.filter(report => report.errors.length > 0).length,
    };
  }

  /**
   * Back up one item and replace it with a symlink into the repository
   */
  public async processPath(item: string, options: ReconcileOptions): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      item,
      sourcePath: path.join(this.homeDir, item),
      destinationPath: path.join(this.repositoryDir, item),
      state: 'missing',
      copied: false,
      removed: false,
      linked: false,
      errors: [],
    };

    try {
      const stats = await this.fileSystem.getLinkStats(report.sourcePath);
      report.state = stats ? classify(stats) : 'missing';
    } catch (error) {
      report.state = 'inaccessible';
      this.fail(report, `Error accessing ${item}`, error);
    }

    logger.debug(`${item}: found ${report.state} at ${report.sourcePath}`);

    if (report.state === 'symlink') {
      logger.info(`Skipping backup for ${item} as it is already a symlink`);
      return report;
    }

    if (options.dryRun) {
      await this.describePlan(report, options);
      return report;
    }

    if (report.state === 'directory' || report.state === 'file') {
      await this.migrate(report, options);
    } else if (report.state === 'missing') {
      logger.warn(`${item} does not exist in home`);
    }

    await this.link(report);
    return report;
  }

  /**
   * Classify an item without changing anything
   */
  public async inspect(item: string): Promise<ItemStatusReport> {
    const sourcePath = path.join(this.homeDir, item);
    const destinationPath = path.join(this.repositoryDir, item);
    const stats = await this.fileSystem.getLinkStats(sourcePath);

    let status: ItemStatus;
    if (stats?.isSymbolicLink()) {
      status = (await this.symlinkService.pointsTo(sourcePath, destinationPath))
        ? 'linked'
        : 'foreign-link';
    } else if (stats) {
      status = 'pending';
    } else {
      status = (await this.fileSystem.pathExists(destinationPath)) ? 'restorable' : 'missing';
    }

    return { item, status, sourcePath, destinationPath };
  }

  /**
   * Copy the item into the repository, then remove the original.
   * The original is kept when the copy fails.
   */
  private async migrate(report: ReconcileReport, options: ReconcileOptions): Promise<void> {
    const kind = report.state === 'directory' ? 'directory' : 'file';

    try {
      await this.fileSystem.copyPath(report.sourcePath, report.destinationPath);
      report.copied = true;
      logger.info(
        options.isSync
          ? `Updated ${kind} ${report.item} in repository`
          : `Copied ${kind} ${report.item} to repository`,
      );
    } catch (error) {
      this.fail(report, `Error copying ${kind} ${report.item}`, error);
      return;
    }

    try {
      await this.fileSystem.remove(report.sourcePath);
      report.removed = true;
    } catch (error) {
      this.fail(report, `Error removing original ${kind} ${report.item}`, error);
    }
  }

  /**
   * Link the home location to the repository copy if the home location is free
   */
  private async link(report: ReconcileReport): Promise<void> {
    try {
      if (await this.fileSystem.getLinkStats(report.sourcePath)) {
        return;
      }
    } catch (error) {
      // Already recorded when the first lstat failed
      if (report.state !== 'inaccessible') {
        this.fail(report, `Error accessing ${report.item}`, error);
      }
      return;
    }

    if (!(await this.fileSystem.pathExists(report.destinationPath))) {
      logger.warn(`No backup for ${report.item} found in repository`);
      return;
    }

    try {
      await this.symlinkService.create(report.destinationPath, report.sourcePath);
      report.linked = true;
      logger.success(`Created symlink for ${report.item}`);
    } catch (error) {
      this.fail(report, `Error creating symlink for ${report.item}`, error);
    }
  }

  private async describePlan(report: ReconcileReport, options: ReconcileOptions): Promise<void> {
    const { item, state } = report;

    if (state === 'directory' || state === 'file') {
      const verb = options.isSync ? 'update' : 'copy';
      logger.info(`[dry run] Would ${verb} ${state} ${item} and replace it with a symlink`);
    } else if (state === 'missing') {
      if (await this.fileSystem.pathExists(report.destinationPath)) {
        logger.info(`[dry run] Would create symlink for ${item}`);
      } else {
        logger.warn(`No backup for ${item} found in repository`);
      }
    }
  }

  private fail(report: ReconcileReport, message: string, error: unknown): void {
    const reason = describeError(error);
    report.errors.push(`${message}: ${reason}`);
    logger.error(`${message}: ${reason}`);
  }
}
