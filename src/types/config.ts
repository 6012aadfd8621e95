import type { DistroFamily } from "./distro.js";

/** Full provisioner configuration. */
export interface ProvisionConfig {
  /** Step catalog; null uses the bundled catalog/workstation.yaml. */
  catalog_path: string | null;
  /** Values substituted for {name} placeholders in the catalog. */
  variables: Record<string, string>;
  run: {
    non_interactive: boolean;
    dry_run: boolean;
    /** Exit 2 instead of 0 when a run completes with warnings. */
    strict_exit_code: boolean;
    allow_untested_release: boolean;
    /** Unhold held packages during dependency repair. */
    release_holds: boolean;
  };
  timeouts: {
    /** Upper bound in seconds for any single command; 0 disables the ceiling. */
    command_timeout_ceiling: number;
    /** Upper bound in seconds for one catalog action. */
    action_timeout: number;
  };
  paths: {
    apt_sources_list: string;
    apt_sources_dir: string;
    apt_preferences_dir: string;
    apt_keyrings_dir: string;
    instructions_dir: string;
  };
  logging: {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
  };
  distro?: Partial<{
    family: DistroFamily;
    name: string;
    version: string;
    codename: string | null;
  }>;
}
