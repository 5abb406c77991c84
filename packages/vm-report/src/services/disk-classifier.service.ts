import { scopeFlag, type DiskLocation } from '../gcp';

export interface DiskClassification extends DiskLocation {
  /** --zone=<zone> or --region=<region> for describe/create calls */
  scopeFlag: string;
  /** --source-disk-zone=<zone> or --source-disk-region=<region> for snapshots */
  snapshotSourceFlag: string;
  /** Multi-zone location snapshots are stored in */
  storageLocation: string;
}

/**
 * Strip the trailing zone suffix: us-east1-b -> us-east1
 */
export function zoneToRegion(zone: string): string {
  const index = zone.lastIndexOf('-');
  return index === -1 ? zone : zone.slice(0, index);
}

function segmentAfter(source: string, collection: 'regions' | 'zones'): string | null {
  const match = source.match(new RegExp(`/${collection}/([^/]+)`));
  return match ? match[1] : null;
}

/**
 * Decide whether a disk is zonal or regional from its resource path.
 *
 * Paths with neither a /regions/ nor a /zones/ segment are treated as
 * zonal disks in fallbackZone (the instance's zone).
 */
export function classifyDisk(source: string, fallbackZone: string): DiskClassification {
  const region = segmentAfter(source, 'regions');
  if (region) {
    const location: DiskLocation = { scope: 'regional', location: region };
    return {
      ...location,
      scopeFlag: scopeFlag(location),
      snapshotSourceFlag: `--source-disk-region=${region}`,
      storageLocation: region,
    };
  }

  const zone = segmentAfter(source, 'zones') ?? fallbackZone;
  const location: DiskLocation = { scope: 'zonal', location: zone };
  return {
    ...location,
    scopeFlag: scopeFlag(location),
    snapshotSourceFlag: `--source-disk-zone=${zone}`,
    storageLocation: zoneToRegion(zone),
  };
}
