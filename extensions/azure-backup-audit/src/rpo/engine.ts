/**
 * RPO Inference Engine
 *
 * Reports the configured cadence when the policy yields one. Otherwise the
 * cadence is estimated from the item's own recovery points. Observed RPO is
 * always the age of the freshest qualifying point.
 */

import type { AuditLogger } from "../types.js";
import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import type { ScheduleInfo } from "../schedule/types.js";
import type { RecoveryPoint, RecoveryPointSource, RpoEvaluation, RpoSubject } from "./types.js";
import { walkNextLink } from "../pagination.js";
import {
  inferCadence,
  latestPoint,
  normalizeRecoveryPoint,
  normalizeRestorePoint,
  observedRpoHours,
  selectPreferredPoint,
} from "./points.js";
import { roundHours } from "../schedule/duration.js";
import { createConsoleLogger } from "../logger.js";

export type RpoEngineOptions = {
  getter: RestGetter;
  apiVersions: Pick<ApiVersions, "recoveryPoints" | "backupInstances" | "sqlRestorePoints">;
  clock?: () => Date;
  logger?: AuditLogger;
};

type PointPull = { points: RecoveryPoint[]; complete: boolean };

export class RpoInferenceEngine {
  private readonly getter: RestGetter;
  private readonly apiVersions: RpoEngineOptions["apiVersions"];
  private readonly clock: () => Date;
  private readonly log: AuditLogger;

  constructor(options: RpoEngineOptions) {
    this.getter = options.getter;
    this.apiVersions = options.apiVersions;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? createConsoleLogger();
  }

  async evaluate(subject: RpoSubject, schedule: ScheduleInfo | null): Promise<RpoEvaluation> {
    if (subject.workload === "AzureSqlDatabase") {
      return this.evaluatePitr(subject);
    }

    const now = this.clock();
    const configuredCadence = schedule?.cadence ?? null;
    const preferByKind = subject.workload === "SQLDataBase" || subject.workload === "SAPHanaDatabase";

    // a policy cadence plus the item's own last-success marker is enough for a VM
    if (configuredCadence && !preferByKind && subject.lastBackupTime) {
      return {
        rpoSource: "Policy",
        configuredCadence,
        inferredCadence: null,
        observedRpoHours: roundHours(now.getTime() - subject.lastBackupTime.getTime()),
        latestPointTime: subject.lastBackupTime,
        latestPointKind: null,
        pointsExamined: 0,
      };
    }

    const { points } = subject.itemId
      ? await this.pullRecoveryPoints(subject.itemId, preferByKind ? null : 2, subject.pointsFrom)
      : { points: [] };

    const inferredCadence = inferCadence(points);
    const chosen = preferByKind ? selectPreferredPoint(points) : latestPoint(points);
    const freshest = chosen?.time ?? subject.lastBackupTime;

    return {
      rpoSource: configuredCadence ? "Policy" : points.length >= 2 ? "RecoveryPoints" : "None",
      configuredCadence,
      inferredCadence,
      observedRpoHours: freshest ? observedRpoHours(now, freshest) : null,
      latestPointTime: freshest,
      latestPointKind: chosen?.kind ?? null,
      pointsExamined: points.length,
    };
  }

  private async evaluatePitr(subject: RpoSubject): Promise<RpoEvaluation> {
    const now = this.clock();
    const points = subject.databaseId ? await this.pullRestorePoints(subject.databaseId) : [];
    const inferredCadence = inferCadence(points);
    const newest = latestPoint(points);

    return {
      rpoSource: points.length >= 2 ? "PITR" : "None",
      configuredCadence: null,
      inferredCadence,
      observedRpoHours: newest ? observedRpoHours(now, newest.time) : null,
      latestPointTime: newest?.time ?? null,
      latestPointKind: newest?.kind ?? null,
      pointsExamined: points.length,
    };
  }

  /**
   * Recovery points for a protected item or backup instance. With `enough`
   * set, paging stops as soon as that many timestamped points are in hand.
   */
  async pullRecoveryPoints(
    itemId: string,
    enough: number | null,
    from: RecoveryPointSource = "protectedItem",
  ): Promise<PointPull> {
    const apiVersion = from === "backupInstance" ? this.apiVersions.backupInstances : this.apiVersions.recoveryPoints;
    const url = `${itemId}/recoveryPoints?api-version=${apiVersion}`;
    const walk = await walkNextLink(this.getter, url, {
      isSufficient:
        enough === null
          ? undefined
          : (items) => items.filter((i) => normalizeRecoveryPoint(i) !== null).length >= enough,
    });
    if (!walk.complete) {
      this.log.warn(`[Rpo] Recovery point listing for ${itemId} stopped after ${walk.pages} page(s)`);
    }
    const points = walk.items.flatMap((raw) => {
      const point = normalizeRecoveryPoint(raw);
      return point ? [point] : [];
    });
    this.log.debug?.(`[Rpo] ${points.length} recovery point(s) for ${itemId}`);
    return { points, complete: walk.complete };
  }

  async pullRestorePoints(databaseId: string): Promise<RecoveryPoint[]> {
    const url = `${databaseId}/restorePoints?api-version=${this.apiVersions.sqlRestorePoints}`;
    const walk = await walkNextLink(this.getter, url);
    if (!walk.complete) {
      this.log.warn(`[Rpo] Restore point listing for ${databaseId} stopped after ${walk.pages} page(s)`);
    }
    return walk.items.flatMap((raw) => {
      const point = normalizeRestorePoint(raw);
      return point ? [point] : [];
    });
  }
}
