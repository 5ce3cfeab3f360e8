import { z } from "zod";

export const SystemMetadataSchema = z.object({
  hostname: z.string(),
  os_name: z.string(),
  os_release: z.string(),
  kernel_version: z.string(),
  machine: z.string(),
  distro_id: z.string(),
  distro_name: z.string(),
  distro_version: z.string(),
  distro_codename: z.string(),
  runtime_implementation: z.string(),
  runtime_version: z.string(),
  cpu_count: z.number().int().nonnegative(),
  cpu_arch: z.string(),
});

export const StructuredPackageSchema = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
  dependencies: z.array(z.string()).optional(),
});

/** Shape of a structured (JSON) snapshot file. */
export const StructuredSnapshotSchema = z.object({
  metadata: SystemMetadataSchema,
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
  package_manager: z.enum(["apt", "yum", "pacman"]),
  packages: z.record(StructuredPackageSchema).refine((p) => Object.keys(p).length > 0, {
    message: "snapshot contains no packages",
  }),
});

export type StructuredSnapshot = z.infer<typeof StructuredSnapshotSchema>;
export type StructuredPackage = z.infer<typeof StructuredPackageSchema>;
