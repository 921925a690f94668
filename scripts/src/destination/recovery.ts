import { MIGRATION_TAGS, TRUE_TAG_VALUE } from "../constants.js";
import { logger } from "../utils/logger.js";
import type { Destination, DestinationRunRecord, ExperimentRequest, ResolvedExperiment } from "./resolver.js";

export type RunState = "finished" | "crashed" | "group";

export interface RecoveryResult {
  experiment: ResolvedExperiment;
  finished: Set<string>;
  reaped: string[];
}

export function classifyRun(record: DestinationRunRecord): RunState {
  if (record.tags[MIGRATION_TAGS.groupParent] !== undefined) {
    return "group";
  }
  return record.tags[MIGRATION_TAGS.complete] === TRUE_TAG_VALUE ? "finished" : "crashed";
}

/**
 * Restart protocol: locate the experiment (fatal when missing), delete every run
 * without a completion marker, report the source ids of the finished ones.
 * Recovery works on whole runs only; partial data of a crashed run is never reused.
 */
export class CrashRecoveryManager {
  constructor(private readonly destination: Destination) {}

  async recover(request: ExperimentRequest): Promise<RecoveryResult> {
    const experiment = await this.destination.locateExperiment(request);
    const records = await this.destination.listRuns(experiment);

    const finished = new Set<string>();
    const reaped: string[] = [];
    for (const record of records) {
      const state = classifyRun(record);
      if (state === "finished") {
        if (record.sourceRunId) {
          finished.add(record.sourceRunId);
        }
      } else if (state === "crashed") {
        logger.info("Deleting run left unfinished by a previous migration", {
          location: record.location,
          sourceRunId: record.sourceRunId
        });
        await this.destination.discardRun(record);
        reaped.push(record.location);
      }
    }

    logger.info("Crash recovery complete", {
      experiment: experiment.name,
      finished: finished.size,
      reaped: reaped.length
    });
    return { experiment, finished, reaped };
  }
}
