/**
 * Read-only Compute Engine describe calls
 */

import { runGcloudJson, runGcloud, type GcloudRunner } from './gcloud';
import {
  diskSchema,
  instanceSchema,
  machineTypeSchema,
  type GceDisk,
  type GceInstance,
  type GceMachineType,
} from './schemas';

export type DiskScope = 'zonal' | 'regional';

/**
 * Where a disk lives: a zone for zonal disks, a region for regional ones
 */
export interface DiskLocation {
  scope: DiskScope;
  location: string;
}

/**
 * The --zone/--region flag that addresses a disk location
 */
export function scopeFlag({ scope, location }: DiskLocation): string {
  return scope === 'regional' ? `--region=${location}` : `--zone=${location}`;
}

export async function describeInstance(
  projectId: string,
  instanceName: string,
  zone: string,
  runner: GcloudRunner = runGcloud
): Promise<GceInstance> {
  return runGcloudJson(
    ['compute', 'instances', 'describe', instanceName, `--project=${projectId}`, `--zone=${zone}`],
    instanceSchema,
    runner
  );
}

export async function describeMachineType(
  projectId: string,
  machineType: string,
  zone: string,
  runner: GcloudRunner = runGcloud
): Promise<GceMachineType> {
  return runGcloudJson(
    ['compute', 'machine-types', 'describe', machineType, `--project=${projectId}`, `--zone=${zone}`],
    machineTypeSchema,
    runner
  );
}

export async function describeDisk(
  projectId: string,
  diskName: string,
  location: DiskLocation,
  runner: GcloudRunner = runGcloud
): Promise<GceDisk> {
  return runGcloudJson(
    ['compute', 'disks', 'describe', diskName, `--project=${projectId}`, scopeFlag(location)],
    diskSchema,
    runner
  );
}
