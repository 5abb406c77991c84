/**
 * Backup command synthesis
 *
 * Builds the gcloud commands that snapshot a disk and recreate it, either
 * through an image or straight from the snapshot. Every command is a list of
 * lines: the gcloud verb first, then its flags.
 */

import type { DiskClassification } from './disk-classifier.service';

export interface BackupCommandInput {
  projectId: string;
  diskName: string;
  classification: DiskClassification;
  /** Size in GB, or "unknown" when the disk could not be described */
  sizeGb: string;
  diskType: string;
  /** YYYYMMDD stamp appended to the snapshot name */
  dateStamp: string;
}

export interface BackupCommands {
  snapshotName: string;
  createSnapshot: string[];
  createImage: string[];
  createDiskFromImage: string[];
  createDiskFromSnapshot: string[];
}

export function getSnapshotName(diskName: string, dateStamp: string): string {
  return `${diskName}-${dateStamp}`;
}

export function synthesizeBackupCommands(input: BackupCommandInput): BackupCommands {
  const { projectId, diskName, classification, sizeGb, diskType, dateStamp } = input;
  const snapshotName = getSnapshotName(diskName, dateStamp);

  return {
    snapshotName,
    createSnapshot: [
      `gcloud compute snapshots create ${snapshotName}`,
      `--project=${projectId} ${classification.snapshotSourceFlag}`,
      `--source-disk=${diskName}`,
      `--storage-location=${classification.storageLocation}`,
    ],
    createImage: [
      `gcloud compute images create ${snapshotName}`,
      `--project=${projectId}`,
      `--source-snapshot=${snapshotName}`,
    ],
    createDiskFromImage: [
      `gcloud compute disks create ${snapshotName}`,
      `--project=${projectId} ${classification.scopeFlag}`,
      `--image=${snapshotName}`,
      `--size=${sizeGb}GB`,
      `--type=${diskType}`,
    ],
    createDiskFromSnapshot: [
      `gcloud compute disks create ${snapshotName}-from-snapshot`,
      `--project=${projectId} ${classification.scopeFlag}`,
      `--source-snapshot=${snapshotName}`,
      `--size=${sizeGb}GB`,
      `--type=${diskType}`,
    ],
  };
}

/**
 * Render a command as shell lines joined by backslash continuations
 */
export function formatCommand(lines: string[], indent = 0, continuationIndent = indent + 4): string[] {
  return lines.map((line, index) => {
    const pad = ' '.repeat(index === 0 ? indent : continuationIndent);
    const continuation = index < lines.length - 1 ? ' \\' : '';
    return `${pad}${line}${continuation}`;
  });
}
