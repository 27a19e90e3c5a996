import { inject, injectable } from 'tsyringe';
import { IScheduleSource } from '../adapters/schedule/schedule-source.interface';
import { NotFoundError, ScheduleIntegrityError } from '../errors/tariff.errors';
import { TariffSchedule } from '../types/tariff.types';
import { isFailure, isSuccess, Result } from '../types/result.types';
import { auditSchedule } from '../utils/schedule-integrity.util';
import { ITariffRepository } from './tariff-repository.interface';

/**
 * Everything readers can observe, replaced as a whole on each publication.
 */
interface RepositoryState {
  readonly versions: ReadonlyMap<string, TariffSchedule>;      // retained, oldest first
  readonly latestByPort: ReadonlyMap<string, TariffSchedule>;
  // Every version ever published, pruned or not: a version id is never reused
  // for different content. Grows by one id per publication.
  readonly publishedIds: ReadonlySet<string>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

@injectable()
export class TariffRepositoryService implements ITariffRepository {
  private state: RepositoryState = {
    versions: new Map(),
    latestByPort: new Map(),
    publishedIds: new Set()
  };

  private publishQueue: Promise<unknown> = Promise.resolve();

  constructor(@inject('ScheduleRetention') private readonly retention: number) {}

  publish(schedule: TariffSchedule): string {
    const current = this.state;

    const issues = auditSchedule(schedule);
    if (current.publishedIds.has(schedule.version)) {
      issues.unshift(`version ${schedule.version} has already been published`);
    }
    if (issues.length > 0) {
      throw new ScheduleIntegrityError(schedule.version, issues);
    }

    const snapshot = deepFreeze(structuredClone(schedule));

    const latestByPort = new Map(current.latestByPort);
    for (const port of snapshot.ports) {
      latestByPort.set(port, snapshot);
    }

    const versions = new Map(current.versions);
    versions.set(snapshot.version, snapshot);
    this.pruneRetired(versions, latestByPort);

    // Single reference swap: requests started earlier keep the state they read
    this.state = {
      versions,
      latestByPort,
      publishedIds: new Set(current.publishedIds).add(snapshot.version)
    };

    console.log(
      `[Tariff Repository] Published schedule ${snapshot.version} for ${snapshot.ports.join(', ')}`
    );
    return snapshot.version;
  }

  publishFrom(source: IScheduleSource): Promise<Result<string>> {
    const next = this.publishQueue.then(() => this.loadAndPublish(source));
    this.publishQueue = next.catch(() => undefined);
    return next;
  }

  getSnapshot(port: string, version?: string): TariffSchedule {
    const { versions, latestByPort } = this.state;

    const snapshot = version === undefined ? latestByPort.get(port) : versions.get(version);
    if (!snapshot || !snapshot.ports.includes(port)) {
      throw new NotFoundError(port, version);
    }
    return snapshot;
  }

  hasPort(port: string): boolean {
    return this.state.latestByPort.has(port);
  }

  listPorts(): string[] {
    return [...this.state.latestByPort.keys()].sort();
  }

  listVersions(): string[] {
    return [...this.state.versions.keys()];
  }

  private async loadAndPublish(source: IScheduleSource): Promise<Result<string>> {
    const loadResult = await source.loadSchedule();
    if (isFailure(loadResult)) {
      return { success: false, message: loadResult.message };
    }
    if (!isSuccess(loadResult)) {
      return { success: true, message: loadResult.message };
    }

    try {
      const version = this.publish(loadResult.data);
      return { success: true, data: version, message: `Schedule ${version} published` };
    } catch (error) {
      if (error instanceof ScheduleIntegrityError) {
        console.error(`[Tariff Repository] ${error.message}`);
        return { success: false, message: error.message };
      }
      throw error;
    }
  }

  /**
   * Drops the oldest versions beyond the retention limit, never one that is
   * still the latest for some port. In-flight requests hold their own
   * reference, so a dropped snapshot lives on until they finish.
   * Dropped versions stay in `publishedIds` and cannot be published again.
   */
  private pruneRetired(
    versions: Map<string, TariffSchedule>,
    latestByPort: ReadonlyMap<string, TariffSchedule>
  ): void {
    const live = new Set(latestByPort.values());
    for (const [version, snapshot] of versions) {
      if (versions.size <= this.retention) {
        break;
      }
      if (!live.has(snapshot)) {
        versions.delete(version);
      }
    }
  }
}
