/**
 * VM report service
 *
 * Fetches the instance and its machine type, describes every attached disk
 * and assembles the report. A disk that cannot be described is reported with
 * unknown size and type; every other gcloud failure aborts the run.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { formatDateStamp } from '../dates';
import {
  describeDisk,
  describeInstance,
  describeMachineType,
  runGcloud,
  type GceAttachedDisk,
  type GcloudRunner,
} from '../gcp';
import { createCommandLogger, type CommandLogger } from '../logger';
import type { DiskReport, VmReport } from '../types';
import { synthesizeBackupCommands } from './backup-commands.service';
import { classifyDisk } from './disk-classifier.service';
import {
  NONE,
  UNKNOWN,
  basename,
  getAttachedDiskName,
  getAttachedDisks,
  getDiskSummary,
  getFirewallTags,
  getMachineSummary,
  getMachineTypeName,
  getNetworkSummary,
  getOperatingSystem,
  getServiceAccount,
} from './extract.service';
import { renderReport } from './report-renderer.service';

export interface ReportOptions {
  projectId: string;
  instanceName: string;
  zone: string;
  /** Directory the report file is written to (default: cwd) */
  outputDir?: string;
  /** Clock used for the run date, file name and snapshot names */
  now?: Date;
}

export interface ReportDependencies {
  runner?: GcloudRunner;
  logger?: CommandLogger;
}

export interface WrittenReport {
  filePath: string;
  report: VmReport;
  content: string;
}

export function getReportFileName(instanceName: string, date: Date): string {
  return `${instanceName}_${formatDateStamp(date)}_info.txt`;
}

async function buildDiskReport(
  disk: GceAttachedDisk,
  options: { projectId: string; zone: string; now: Date },
  runner: GcloudRunner,
  logger: CommandLogger
): Promise<DiskReport> {
  const name = getAttachedDiskName(disk);
  const uri = disk.source ?? NONE;
  const classification = classifyDisk(uri, options.zone);

  let sizeGb = UNKNOWN;
  let diskType = UNKNOWN;
  let describeFailed = false;

  try {
    const described = await describeDisk(options.projectId, name, classification, runner);
    sizeGb = described.sizeGb;
    diskType = described.type ? basename(described.type) : UNKNOWN;
  } catch (error) {
    describeFailed = true;
    logger.warn(`Unable to describe disk '${name}'`, error);
  }

  return {
    name,
    uri,
    boot: disk.boot === true,
    classification,
    sizeGb,
    diskType,
    describeFailed,
    commands: synthesizeBackupCommands({
      projectId: options.projectId,
      diskName: name,
      classification,
      sizeGb,
      diskType,
      dateStamp: formatDateStamp(options.now),
    }),
  };
}

/**
 * Collect everything the report needs from gcloud
 */
export async function buildVmReport(
  options: ReportOptions,
  deps: ReportDependencies = {}
): Promise<VmReport> {
  const runner = deps.runner ?? runGcloud;
  const logger = deps.logger ?? createCommandLogger('report');
  const now = options.now ?? new Date();
  const { projectId, instanceName, zone } = options;

  logger.info('Describing instance', { projectId, instanceName, zone });
  const instance = await describeInstance(projectId, instanceName, zone, runner);

  const machineTypeName = getMachineTypeName(instance);
  logger.info('Describing machine type', { machineType: machineTypeName });
  const machineType = await describeMachineType(projectId, machineTypeName, zone, runner);

  const disks: DiskReport[] = [];
  for (const disk of getAttachedDisks(instance)) {
    disks.push(await buildDiskReport(disk, { projectId, zone, now }, runner, logger));
  }

  return {
    projectId,
    instanceName,
    zone,
    generatedAt: now,
    machine: getMachineSummary(instance, machineType),
    operatingSystem: getOperatingSystem(instance),
    network: getNetworkSummary(instance),
    serviceAccount: getServiceAccount(instance),
    firewallTags: getFirewallTags(instance),
    disks,
    diskSummary: getDiskSummary(instance),
  };
}

/**
 * Build the report, render it and write <instance>_<YYYYMMDD>_info.txt
 */
export async function writeVmReport(
  options: ReportOptions,
  deps: ReportDependencies = {}
): Promise<WrittenReport> {
  const now = options.now ?? new Date();
  const report = await buildVmReport({ ...options, now }, deps);
  const content = renderReport(report);

  const outputDir = options.outputDir ?? process.cwd();
  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, getReportFileName(options.instanceName, now));
  await fs.writeFile(filePath, content, 'utf-8');

  return { filePath, report, content };
}
