import type { DocumentStore } from "./store.js";
import type { BuildHistory, BuildStatus, Instance, NewBuildHistory, User } from "./types.js";

export interface BuildOutcome {
  startTime: Date;
  endTime: Date;
  exitCode: number;
}

/** "success" only for exit code 0. */
export function buildStatus(exitCode: number): BuildStatus {
  return exitCode === 0 ? "success" : "failed";
}

/** Milliseconds from start to end. */
export function buildDelay(startTime: Date, endTime: Date): number {
  return endTime.getTime() - startTime.getTime();
}

export function buildHistoryParams(
  user: Pick<User, "id">,
  instance: Pick<Instance, "id">,
  outcome: BuildOutcome,
): NewBuildHistory {
  return {
    instanceId: instance.id,
    creatorId: user.id,
    status: buildStatus(outcome.exitCode),
    exitCode: outcome.exitCode,
    startTime: outcome.startTime,
    endTime: outcome.endTime,
    delay: buildDelay(outcome.startTime, outcome.endTime),
  };
}

/**
 * Append a build-history entry. The exit code is stored as reported;
 * insertion failures propagate to the caller.
 */
export async function addBuildHistory(
  store: DocumentStore,
  user: Pick<User, "id">,
  instance: Pick<Instance, "id">,
  outcome: BuildOutcome,
): Promise<BuildHistory> {
  return store.insertBuildHistory(buildHistoryParams(user, instance, outcome));
}
