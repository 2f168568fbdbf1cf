import type { Address, ProjectStatus, ProjectTimes } from "../types";

/**
 * What a pool may ask of the registry that created it. Pools hold only their
 * project id; ownership, status and the reward window live with the project.
 */
export interface ILaunchPoolHost {
  getProjectOwner(projectId: bigint): Address;
  getProjectStatus(projectId: bigint): ProjectStatus;
  getProjectTimes(projectId: bigint): ProjectTimes;
  getProjectRewardAsset(projectId: bigint): Address;
  /** Ends the project's reward window at `now`. */
  stopProjectRewards(projectId: bigint, now: number): void;
}
