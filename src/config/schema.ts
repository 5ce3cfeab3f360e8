import { z } from "zod";

export const SnapshotConfigSchema = z.object({
  commands: z.object({
    list_timeout_seconds: z.number().positive(),
    detail_timeout_seconds: z.number().positive(),
  }),
  output: z.object({
    directory: z.string().min(1),
    indent: z.number().int().min(0).max(10),
    compression_level: z.number().int().min(1).max(9),
    preview_lines: z.number().int().positive(),
    validate: z.boolean(),
  }),
  /** Force a backend instead of detecting one from os-release. */
  package_manager: z.enum(["apt", "yum", "pacman", "zypper", "unknown"]).optional(),
});

export type SnapshotConfig = z.infer<typeof SnapshotConfigSchema>;

export const DEFAULT_CONFIG: SnapshotConfig = {
  commands: { list_timeout_seconds: 120, detail_timeout_seconds: 15 },
  output: { directory: ".", indent: 2, compression_level: 6, preview_lines: 20, validate: true },
};
