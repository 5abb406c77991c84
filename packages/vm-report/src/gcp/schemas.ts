/**
 * Shapes of the gcloud compute payloads vm-report reads.
 * Only the fields the report uses are declared; zod strips the rest.
 */

import { z } from 'zod';

export const attachedDiskSchema = z.object({
  source: z.string().optional(),
  deviceName: z.string().optional(),
  boot: z.boolean().optional(),
  licenses: z.array(z.string()).optional(),
});

export const networkInterfaceSchema = z.object({
  network: z.string().optional(),
  subnetwork: z.string().optional(),
  networkIP: z.string().optional(),
  accessConfigs: z.array(z.object({ natIP: z.string().optional() })).optional(),
});

export const instanceSchema = z.object({
  name: z.string(),
  machineType: z.string(),
  disks: z.array(attachedDiskSchema).optional(),
  networkInterfaces: z.array(networkInterfaceSchema).optional(),
  serviceAccounts: z.array(z.object({ email: z.string().optional() })).optional(),
  tags: z.object({ items: z.array(z.string()).optional() }).optional(),
});

export const machineTypeSchema = z.object({
  name: z.string(),
  guestCpus: z.number(),
  memoryMb: z.number(),
});

// gcloud prints int64 fields such as sizeGb as JSON strings
export const diskSchema = z.object({
  name: z.string(),
  sizeGb: z.union([z.string(), z.number()]).transform(String),
  type: z.string().optional(),
});

export type GceAttachedDisk = z.infer<typeof attachedDiskSchema>;
export type GceInstance = z.infer<typeof instanceSchema>;
export type GceMachineType = z.infer<typeof machineTypeSchema>;
export type GceDisk = z.infer<typeof diskSchema>;
