/**
 * GCP utilities for vm-report
 */

export {
  runGcloud,
  runGcloudJson,
  isGcloudInstalled,
  getGcloudBinary,
  type GcloudRunner,
} from './gcloud';

export {
  describeInstance,
  describeMachineType,
  describeDisk,
  scopeFlag,
  type DiskScope,
  type DiskLocation,
} from './compute';

export type {
  GceAttachedDisk,
  GceInstance,
  GceMachineType,
  GceDisk,
} from './schemas';
