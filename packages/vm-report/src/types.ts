/**
 * Report model shared by the report service and the renderer
 */

import type { BackupCommands } from './services/backup-commands.service';
import type { DiskClassification } from './services/disk-classifier.service';
import type { DiskSummary, MachineSummary, NetworkSummary } from './services/extract.service';

export interface DiskReport {
  name: string;
  /** Full resource path of the disk, "None" when the instance reports none */
  uri: string;
  boot: boolean;
  classification: DiskClassification;
  /** "unknown" when the describe call failed */
  sizeGb: string;
  diskType: string;
  describeFailed: boolean;
  commands: BackupCommands;
}

export interface VmReport {
  projectId: string;
  instanceName: string;
  zone: string;
  generatedAt: Date;
  machine: MachineSummary;
  operatingSystem: string;
  network: NetworkSummary;
  serviceAccount: string;
  firewallTags: string;
  disks: DiskReport[];
  diskSummary: DiskSummary;
}
