// Factory for distro-specific package backends.
// Called once at startup after detectDistro(); the returned PackageBackend is
// carried by the ProvisionContext and used by every step.
// Adding a distro family requires: (1) a new backend class, (2) a new case here,
// (3) a family in detectDistro() and (4) action lists in the catalog.

import type { DistroContext } from "../types/distro.js";
import type { Logger } from "../logger.js";
import type { PackageBackend } from "./interface.js";
import type { CommandRunner } from "./runner.js";
import { AptBackend } from "./apt.js";
import { ZypperBackend } from "./zypper.js";

export function createBackend(distro: DistroContext, runner: CommandRunner, logger: Logger): PackageBackend {
  switch (distro.family) {
    case "debian": return new AptBackend(runner, logger);
    case "tumbleweed": return new ZypperBackend(runner, logger);
  }
}
