import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { GcloudCommandError } from '../errors';
import type { CommandLogger } from '../logger';
import { buildVmReport, getReportFileName, writeVmReport } from '../services/report.service';

const COMPUTE = 'https://www.googleapis.com/compute/v1';
const NOW = new Date(2026, 9, 18, 9, 5, 7);

const INSTANCE = {
  name: 'web-1',
  machineType: `${COMPUTE}/projects/test-project/zones/us-east1-b/machineTypes/e2-standard-4`,
  status: 'RUNNING',
  disks: [
    {
      boot: true,
      deviceName: 'web-1',
      source: `${COMPUTE}/projects/test-project/zones/us-east1-b/disks/web-1`,
      licenses: [`${COMPUTE}/projects/debian-cloud/global/licenses/debian-12-bookworm`],
    },
    {
      boot: false,
      deviceName: 'shared-data',
      source: `${COMPUTE}/projects/test-project/regions/us-east1/disks/shared-data`,
    },
    {
      boot: false,
      deviceName: 'scratch',
      source: `${COMPUTE}/projects/test-project/zones/us-east1-b/disks/scratch`,
    },
  ],
  networkInterfaces: [
    {
      network: `${COMPUTE}/projects/test-project/global/networks/default`,
      subnetwork: `${COMPUTE}/projects/test-project/regions/us-east1/subnetworks/default`,
      networkIP: '10.142.0.2',
      accessConfigs: [{ name: 'External NAT', natIP: '203.0.113.10' }],
    },
  ],
  serviceAccounts: [{ email: 'vm-sa@test-project.iam.gserviceaccount.com', scopes: [] }],
  tags: { items: ['http-server', 'https-server'] },
};

const MACHINE_TYPE = { name: 'e2-standard-4', guestCpus: 4, memoryMb: 16384 };

const DISKS: Record<string, object> = {
  'web-1': { name: 'web-1', sizeGb: '20', type: `${COMPUTE}/projects/test-project/zones/us-east1-b/diskTypes/pd-balanced` },
  'shared-data': { name: 'shared-data', sizeGb: '200', type: `${COMPUTE}/projects/test-project/regions/us-east1/diskTypes/pd-ssd` },
};

/**
 * In-process stand-in for gcloud: answers describe calls from the fixtures
 * above and fails for any disk it does not know.
 */
function createFakeGcloud() {
  return vi.fn(async (args: string[]) => {
    const [, resource, , name] = args;
    if (resource === 'instances') return JSON.stringify(INSTANCE);
    if (resource === 'machine-types') return JSON.stringify(MACHINE_TYPE);
    if (resource === 'disks' && DISKS[name]) return JSON.stringify(DISKS[name]);
    throw new GcloudCommandError(args, `ERROR: (gcloud.compute.${resource}.describe) Could not fetch resource`);
  });
}

function createSilentLogger(): CommandLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const OPTIONS = { projectId: 'test-project', instanceName: 'web-1', zone: 'us-east1-b', now: NOW };

describe('getReportFileName', () => {
  it('should combine the instance name and date stamp', () => {
    expect(getReportFileName('web-1', NOW)).toBe('web-1_20261018_info.txt');
  });
});

describe('buildVmReport', () => {
  it('should describe the instance, machine type and every disk', async () => {
    const runner = createFakeGcloud();

    await buildVmReport(OPTIONS, { runner, logger: createSilentLogger() });

    expect(runner.mock.calls.map(([args]) => args)).toEqual([
      ['compute', 'instances', 'describe', 'web-1', '--project=test-project', '--zone=us-east1-b', '--format=json'],
      ['compute', 'machine-types', 'describe', 'e2-standard-4', '--project=test-project', '--zone=us-east1-b', '--format=json'],
      ['compute', 'disks', 'describe', 'web-1', '--project=test-project', '--zone=us-east1-b', '--format=json'],
      ['compute', 'disks', 'describe', 'shared-data', '--project=test-project', '--region=us-east1', '--format=json'],
      ['compute', 'disks', 'describe', 'scratch', '--project=test-project', '--zone=us-east1-b', '--format=json'],
    ]);
  });

  it('should extract instance level fields', async () => {
    const report = await buildVmReport(OPTIONS, { runner: createFakeGcloud(), logger: createSilentLogger() });

    expect(report.machine).toEqual({ machineType: 'e2-standard-4', vcpus: 4, memoryGb: '16.00' });
    expect(report.operatingSystem).toBe('debian-12-bookworm');
    expect(report.network).toEqual({
      network: 'default',
      subnet: 'default',
      internalIp: '10.142.0.2',
      externalIp: '203.0.113.10',
    });
    expect(report.serviceAccount).toBe('vm-sa@test-project.iam.gserviceaccount.com');
    expect(report.firewallTags).toBe('http-server,https-server');
    expect(report.diskSummary).toEqual({ bootDisk: 'web-1', dataDisks: ['shared-data', 'scratch'] });
  });

  it('should classify disks and fill in size and type', async () => {
    const report = await buildVmReport(OPTIONS, { runner: createFakeGcloud(), logger: createSilentLogger() });
    const [boot, shared] = report.disks;

    expect(boot.boot).toBe(true);
    expect(boot.classification.scope).toBe('zonal');
    expect(boot.sizeGb).toBe('20');
    expect(boot.diskType).toBe('pd-balanced');
    expect(boot.commands.snapshotName).toBe('web-1-20261018');

    expect(shared.boot).toBe(false);
    expect(shared.classification.scope).toBe('regional');
    expect(shared.classification.storageLocation).toBe('us-east1');
    expect(shared.sizeGb).toBe('200');
    expect(shared.diskType).toBe('pd-ssd');
    expect(shared.commands.createDiskFromSnapshot).toEqual([
      'gcloud compute disks create shared-data-20261018-from-snapshot',
      '--project=test-project --region=us-east1',
      '--source-snapshot=shared-data-20261018',
      '--size=200GB',
      '--type=pd-ssd',
    ]);
  });

  it('should keep a disk entry with unknown fields when its describe call fails', async () => {
    const logger = createSilentLogger();
    const report = await buildVmReport(OPTIONS, { runner: createFakeGcloud(), logger });
    const scratch = report.disks[2];

    expect(report.disks).toHaveLength(3);
    expect(scratch.name).toBe('scratch');
    expect(scratch.describeFailed).toBe(true);
    expect(scratch.sizeGb).toBe('unknown');
    expect(scratch.diskType).toBe('unknown');
    expect(scratch.commands.createDiskFromImage[3]).toBe('--size=unknownGB');
    expect(logger.warn).toHaveBeenCalledWith("Unable to describe disk 'scratch'", expect.any(GcloudCommandError));
  });

  it('should abort when the instance cannot be described', async () => {
    const runner = vi.fn(async (args: string[]) => {
      throw new GcloudCommandError(args, 'ERROR: (gcloud.compute.instances.describe) You do not currently have an active account selected.');
    });

    await expect(buildVmReport(OPTIONS, { runner, logger: createSilentLogger() })).rejects.toBeInstanceOf(GcloudCommandError);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('should handle an instance without disks', async () => {
    const runner = vi.fn(async (args: string[]) =>
      args[1] === 'instances'
        ? JSON.stringify({ name: 'bare', machineType: 'zones/us-east1-b/machineTypes/e2-micro' })
        : JSON.stringify({ name: 'e2-micro', guestCpus: 2, memoryMb: 1024 })
    );

    const report = await buildVmReport({ ...OPTIONS, instanceName: 'bare' }, { runner, logger: createSilentLogger() });

    expect(report.disks).toEqual([]);
    expect(report.diskSummary).toEqual({ bootDisk: null, dataDisks: [] });
    expect(report.machine.memoryGb).toBe('1.00');
    expect(runner).toHaveBeenCalledTimes(2);
  });
});

describe('writeVmReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = path.join(tmpdir(), `vm-report-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the rendered report to the output directory', async () => {
    const result = await writeVmReport(
      { ...OPTIONS, outputDir: tempDir },
      { runner: createFakeGcloud(), logger: createSilentLogger() }
    );

    expect(result.filePath).toBe(path.join(tempDir, 'web-1_20261018_info.txt'));
    const written = await fs.readFile(result.filePath, 'utf-8');
    expect(written).toBe(result.content);

    const lines = written.split('\n');
    expect(lines).toContain('        Run Date: 2026-10-18 09:05:07');
    expect(lines).toContain("       ! Warning! Unable to describe disk 'scratch'.");
    expect(lines).toContain('    - Data disk 2: scratch');
  });

  it('should create a missing output directory', async () => {
    const nested = path.join(tempDir, 'reports', 'vm');

    const result = await writeVmReport(
      { ...OPTIONS, outputDir: nested },
      { runner: createFakeGcloud(), logger: createSilentLogger() }
    );

    await expect(fs.stat(result.filePath)).resolves.toBeDefined();
  });
});
