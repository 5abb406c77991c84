/**
 * Report renderer
 * Turns a VmReport into the plain-text document written to disk
 */

import { formatTimestamp } from '../dates';
import type { DiskReport, VmReport } from '../types';
import { formatCommand } from './backup-commands.service';
import { NONE } from './extract.service';

const HEAVY_RULE = '='.repeat(58);
const LIGHT_RULE = '-'.repeat(58);

const COMMAND_INDENT = 12;
const FLAG_INDENT = 16;

function renderHeader(report: VmReport): string[] {
  return [
    HEAVY_RULE,
    `        VM Report: ${report.instanceName}`,
    `        Project: ${report.projectId}`,
    `        Zone:    ${report.zone}`,
    `        Run Date: ${formatTimestamp(report.generatedAt)}`,
    HEAVY_RULE,
    '',
  ];
}

function renderMachine(report: VmReport): string[] {
  const { machine } = report;
  return [
    `==> Machine Type: ${machine.machineType}`,
    `    - vCPUs:        ${machine.vcpus}`,
    `    - Memory (GB):  ${machine.memoryGb}`,
    '',
    `==> Operating System: ${report.operatingSystem}`,
    '',
  ];
}

function renderNetwork(report: VmReport): string[] {
  const { network } = report;
  return [
    '==> Network and Subnet:',
    `    - VPC Network: ${network.network}`,
    `    - Subnet:      ${network.subnet}`,
    `    - Internal IP: ${network.internalIp}`,
    `    - External IP: ${network.externalIp}`,
    '',
    `==> Service Account: ${report.serviceAccount}`,
    '',
    `==> Firewall Tags: ${report.firewallTags}`,
    '',
  ];
}

function describeTopology(disk: DiskReport): string {
  const { scope, location } = disk.classification;
  return scope === 'regional' ? `Regional (region = ${location})` : `Zonal (zone = ${location})`;
}

function renderCommand(title: string, lines: string[]): string[] {
  return [`       # ${title}:`, ...formatCommand(lines, COMMAND_INDENT, FLAG_INDENT), ''];
}

export function renderDisk(disk: DiskReport): string[] {
  const lines = [
    `  -> ${disk.boot ? 'Boot Disk' : 'Attached Disk'}:`,
    `       * Name: ${disk.name}`,
    `       * URI:  ${disk.uri}`,
    `       * Type: ${describeTopology(disk)}`,
  ];

  if (disk.describeFailed) {
    lines.push(`       ! Warning! Unable to describe disk '${disk.name}'.`);
  }

  lines.push(
    `       * Size (GB):   ${disk.sizeGb}`,
    `       * Disk Type:   ${disk.diskType}`,
    '',
    '       # Suggested commands:',
    ...renderCommand('1) Create Snapshot', disk.commands.createSnapshot),
    ...renderCommand('2) Create Image from Snapshot', disk.commands.createImage),
    ...renderCommand('3) Create new Disk from Image', disk.commands.createDiskFromImage),
    ...renderCommand('4) Create new Disk from Snapshot', disk.commands.createDiskFromSnapshot)
  );

  return lines;
}

function renderDisks(report: VmReport): string[] {
  if (report.disks.length === 0) {
    return ['==> Attached Disks:', '    None', ''];
  }
  return ['==> Attached Disks:', ...report.disks.flatMap(renderDisk)];
}

function renderDiskSummary(report: VmReport): string[] {
  const { bootDisk, dataDisks } = report.diskSummary;
  const lines = ['==> Disk Summary:', `    - Boot disk: ${bootDisk ?? NONE}`];

  if (dataDisks.length === 0) {
    lines.push(`    - Data disks: ${NONE}`);
  } else {
    dataDisks.forEach((name, index) => {
      lines.push(`    - Data disk ${index + 1}: ${name}`);
    });
  }

  lines.push('');
  return lines;
}

function renderFooter(): string[] {
  return ['', LIGHT_RULE, '    END OF REPORT', LIGHT_RULE];
}

export function renderReport(report: VmReport): string {
  const lines = [
    ...renderHeader(report),
    ...renderMachine(report),
    ...renderNetwork(report),
    ...renderDisks(report),
    ...renderDiskSummary(report),
    ...renderFooter(),
  ];
  return lines.join('\n') + '\n';
}
