import { NotFoundError } from "../errors.js";
import type { EnvironmentDriver, EnvironmentKind } from "./contract.js";

/**
 * Registration table mapping each environment kind to the driver serving it.
 * Drivers are registered once at process startup, before sessions exist.
 */
export class DriverRegistry {
  private readonly drivers = new Map<EnvironmentKind, EnvironmentDriver>();

  register(kind: EnvironmentKind, driver: EnvironmentDriver): this {
    if (this.drivers.has(kind)) {
      throw new Error(`a driver is already registered for kind ${kind}`);
    }
    this.drivers.set(kind, driver);
    return this;
  }

  /** Returns the driver serving {@link kind} or throws {@link NotFoundError}. */
  resolve(kind: EnvironmentKind): EnvironmentDriver {
    const driver = this.drivers.get(kind);
    if (!driver) {
      throw new NotFoundError("driver", kind);
    }
    return driver;
  }

  has(kind: EnvironmentKind): boolean {
    return this.drivers.has(kind);
  }

  kinds(): EnvironmentKind[] {
    return Array.from(this.drivers.keys());
  }
}
