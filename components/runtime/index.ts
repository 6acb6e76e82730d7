import { ContainerRuntimeDriver, DriverProvider } from "../shared/interfaces";
import { ValidationError } from "../shared/utils/error-handling";

export * from "./docker";

/**
 * Driver provider over a fixed set of drivers, keyed by environment id
 */
export class StaticDriverProvider implements DriverProvider {
    private readonly drivers: Map<string, ContainerRuntimeDriver>;

    constructor(drivers: Record<string, ContainerRuntimeDriver>) {
        this.drivers = new Map(Object.entries(drivers));
    }

    public getDriver(environmentId: string): ContainerRuntimeDriver {
        const driver = this.drivers.get(environmentId);
        if (!driver) {
            throw new ValidationError("StaticDriverProvider", environmentId, "environmentId", `Unknown environment '${environmentId}'`);
        }
        return driver;
    }
}
