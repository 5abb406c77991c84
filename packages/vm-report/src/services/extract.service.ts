/**
 * Field extraction from describe payloads
 */

import type { GceAttachedDisk, GceInstance, GceMachineType } from '../gcp';

export const NONE = 'None';
export const UNKNOWN = 'unknown';

export interface MachineSummary {
  machineType: string;
  vcpus: number;
  memoryGb: string;
}

export interface NetworkSummary {
  network: string;
  subnet: string;
  internalIp: string;
  externalIp: string;
}

export interface DiskSummary {
  bootDisk: string | null;
  dataDisks: string[];
}

/**
 * Last segment of a resource path or URL
 */
export function basename(resource: string): string {
  const segments = resource.split('/');
  return segments[segments.length - 1];
}

/**
 * MB to GB, truncated to two decimals: 3840 -> "3.75", 1740 -> "1.69"
 */
export function formatMemoryGb(memoryMb: number): string {
  const hundredths = Math.floor((memoryMb * 100) / 1024);
  const whole = Math.floor(hundredths / 100);
  const fraction = String(hundredths % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}

export function getMachineTypeName(instance: GceInstance): string {
  return basename(instance.machineType);
}

export function getMachineSummary(instance: GceInstance, machineType: GceMachineType): MachineSummary {
  return {
    machineType: getMachineTypeName(instance),
    vcpus: machineType.guestCpus,
    memoryGb: formatMemoryGb(machineType.memoryMb),
  };
}

export function getAttachedDisks(instance: GceInstance): GceAttachedDisk[] {
  return instance.disks ?? [];
}

function getBootDisk(instance: GceInstance): GceAttachedDisk | undefined {
  return getAttachedDisks(instance).find((disk) => disk.boot === true);
}

/**
 * Name of an attached disk: its source's last segment, else its device name
 */
export function getAttachedDiskName(disk: GceAttachedDisk): string {
  if (disk.source) {
    return basename(disk.source);
  }
  return disk.deviceName ?? UNKNOWN;
}

/**
 * Operating system, read from the last license on the boot disk
 */
export function getOperatingSystem(instance: GceInstance): string {
  const licenses = getBootDisk(instance)?.licenses ?? [];
  const last = licenses[licenses.length - 1];
  return last ? basename(last) : UNKNOWN;
}

export function getNetworkSummary(instance: GceInstance): NetworkSummary {
  const nic = instance.networkInterfaces?.[0];
  return {
    network: nic?.network ? basename(nic.network) : NONE,
    subnet: nic?.subnetwork ? basename(nic.subnetwork) : NONE,
    internalIp: nic?.networkIP ?? NONE,
    externalIp: nic?.accessConfigs?.[0]?.natIP ?? NONE,
  };
}

export function getServiceAccount(instance: GceInstance): string {
  return instance.serviceAccounts?.[0]?.email ?? NONE;
}

export function getFirewallTags(instance: GceInstance): string {
  const items = instance.tags?.items ?? [];
  return items.length > 0 ? items.join(',') : NONE;
}

export function getDiskSummary(instance: GceInstance): DiskSummary {
  const disks = getAttachedDisks(instance);
  const boot = disks.find((disk) => disk.boot === true);

  return {
    bootDisk: boot ? getAttachedDiskName(boot) : null,
    dataDisks: disks.filter((disk) => disk.boot !== true).map(getAttachedDiskName),
  };
}
