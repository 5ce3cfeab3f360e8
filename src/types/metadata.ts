/**
 * Host facts captured once per snapshot.
 * Facts that could not be read hold `UNKNOWN_FACT` (or 0 for cpu_count).
 */
export interface SystemMetadata {
  readonly hostname: string;
  readonly os_name: string;
  readonly os_release: string;
  readonly kernel_version: string;
  readonly machine: string;
  readonly distro_id: string;
  readonly distro_name: string;
  readonly distro_version: string;
  readonly distro_codename: string;
  readonly runtime_implementation: string;
  readonly runtime_version: string;
  readonly cpu_count: number;
  readonly cpu_arch: string;
}

export const UNKNOWN_FACT = "unknown";
