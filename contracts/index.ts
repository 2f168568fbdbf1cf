export * from "./types";
export * from "./errors";
export * from "./events";
export { loadConfig, type LaunchPoolConfig, type LogLevel } from "./config";
export { createLogger, type Logger } from "./logger";
export { NATIVE_ASSET, type IAssetLedger } from "./interfaces/IAssetLedger";
export { systemClock, type IClock } from "./interfaces/IClock";
export type { ILaunchPoolHost } from "./interfaces/ILaunchPoolHost";
export * as RewardMath from "./libraries/RewardMath";
export { computePoolAddress, poolInitCodeHash, poolSalt, type PoolIdentityParams } from "./libraries/PoolAddress";
export { LaunchPool, type LaunchPoolDeps, type LaunchPoolInitParams } from "./LaunchPool";
export { Project, displayStatus, projectMetadataSchema, type ProjectRecord, type StatusTransitionResult } from "./Project";
export {
  LaunchPoolFactory,
  FACTORY_POLICY_V1,
  FACTORY_POLICY_V2,
  FACTORY_POLICY_V3,
  type LaunchPoolFactoryOptions,
} from "./LaunchPoolFactory";
