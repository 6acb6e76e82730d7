import Docker from "dockerode";
import { ContainerRuntimeDriver, DriverProvider } from "../../shared/interfaces";
import { ComponentLogger } from "../../shared/utils/logging";
import { RuntimeOperation, RuntimeOperationError, ValidationError, toError } from "../../shared/utils/error-handling";
import {
    MAINTENANCE_IGNORE,
    MAINTENANCE_LABEL,
    MANAGED_LABEL,
    SERVICE_LABEL,
    STACK_LABEL
} from "../../shared/utils/docker-naming";
import { ContainerInfo, ContainerSpec, DockerEndpointConfig, EnvironmentConfig } from "../../../automation/types";

/**
 * One published port, in the shape the engine API wants
 */
export interface PortMapping {
    /** e.g. `80/tcp` */
    containerPort: string;
    hostPort?: string;
    hostIp?: string;
}

/**
 * Parse a compose port entry: `80`, `8080:80`, `127.0.0.1:8080:80`, each with an optional `/udp`
 */
export function parsePortMapping(entry: string): PortMapping {
    const [mapping, protocol = "tcp"] = entry.split("/");
    const parts = mapping.split(":");

    if (parts.length === 1) {
        return { containerPort: `${parts[0]}/${protocol}` };
    }
    if (parts.length === 2) {
        return { containerPort: `${parts[1]}/${protocol}`, hostPort: parts[0] };
    }
    return {
        containerPort: `${parts[parts.length - 1]}/${protocol}`,
        hostPort: parts[parts.length - 2],
        hostIp: parts.slice(0, parts.length - 2).join(":")
    };
}

/**
 * Translate a container spec into engine create options. Only the first network is
 * attached at create time; the driver connects the rest before starting.
 */
export function buildCreateOptions(spec: ContainerSpec): Docker.ContainerCreateOptions {
    const exposedPorts: Record<string, {}> = {};
    const portBindings: Record<string, Array<{ HostIp?: string; HostPort?: string }>> = {};
    for (const entry of spec.ports) {
        const port = parsePortMapping(entry);
        exposedPorts[port.containerPort] = {};
        if (port.hostPort) {
            const bindings = portBindings[port.containerPort] ?? [];
            bindings.push(port.hostIp ? { HostIp: port.hostIp, HostPort: port.hostPort } : { HostPort: port.hostPort });
            portBindings[port.containerPort] = bindings;
        }
    }

    const primaryNetwork = spec.networks[0];
    const alias = spec.labels[SERVICE_LABEL];

    return {
        name: spec.name,
        Image: spec.image,
        Env: Object.entries(spec.environment).map(([name, value]) => `${name}=${value}`),
        Labels: { ...spec.labels },
        Cmd: spec.command ? [...spec.command] : undefined,
        ExposedPorts: exposedPorts,
        HostConfig: {
            Binds: [...spec.volumes],
            PortBindings: portBindings,
            RestartPolicy: { Name: spec.restartPolicy ?? "no" },
            NetworkMode: primaryNetwork
        },
        NetworkingConfig: primaryNetwork
            ? { EndpointsConfig: { [primaryNetwork]: { Aliases: alias ? [alias] : [] } } }
            : undefined
    };
}

function hasStatusCode(error: unknown, statusCode: number): boolean {
    return typeof error === "object" && error !== null && "statusCode" in error && error.statusCode === statusCode;
}

function toContainerInfo(container: Docker.ContainerInfo): ContainerInfo {
    const name = container.Names[0] ?? container.Id;
    return {
        id: container.Id,
        name: name.startsWith("/") ? name.slice(1) : name,
        image: container.Image,
        state: container.State,
        labels: { ...container.Labels }
    };
}

/**
 * ContainerRuntimeDriver over the engine API via dockerode
 */
export class DockerRuntimeDriver implements ContainerRuntimeDriver {
    private readonly logger: ComponentLogger;

    constructor(private readonly docker: Docker, private readonly environmentId: string) {
        this.logger = new ComponentLogger("DockerRuntimeDriver", environmentId);
    }

    public async pullImage(ref: string): Promise<void> {
        this.logger.runtimeOperationStart("pull", ref);
        await this.call("pull", ref, async () => {
            const stream = await this.docker.pull(ref);
            await new Promise<void>((resolve, reject) => {
                this.docker.modem.followProgress(stream, (error: Error | null) => (error ? reject(error) : resolve()));
            });
        });
    }

    public async imageExists(ref: string): Promise<boolean> {
        try {
            await this.docker.getImage(ref).inspect();
            return true;
        } catch (error) {
            if (hasStatusCode(error, 404)) {
                return false;
            }
            throw this.failure("inspect", ref, error);
        }
    }

    public async ensureNetwork(name: string): Promise<void> {
        await this.call("network", name, async () => {
            const existing = await this.docker.listNetworks({ filters: { name: [name] } });
            if (existing.some(network => network.Name === name)) {
                return;
            }
            try {
                await this.docker.createNetwork({
                    Name: name,
                    Driver: "bridge",
                    Labels: { [MANAGED_LABEL]: "true" }
                });
                this.logger.info(`Created network ${name}`);
            } catch (error) {
                // Created concurrently by someone else
                if (!hasStatusCode(error, 409)) {
                    throw error;
                }
            }
        });
    }

    public async findContainerByName(name: string): Promise<ContainerInfo | undefined> {
        return this.call("list", name, async () => {
            const containers = await this.docker.listContainers({ all: true, filters: { name: [name] } });
            const match = containers.find(container => container.Names.includes(`/${name}`));
            return match ? toContainerInfo(match) : undefined;
        });
    }

    public async createAndStart(spec: ContainerSpec): Promise<string> {
        const container = await this.call("create", spec.name, async () => {
            const created = await this.docker.createContainer(buildCreateOptions(spec));
            for (const network of spec.networks.slice(1)) {
                await this.docker.getNetwork(network).connect({ Container: created.id });
            }
            return created;
        });

        try {
            await container.start();
        } catch (error) {
            const startError = this.failure("start", spec.name, error);
            await container.remove({ force: true }).catch((cleanupError: unknown) => {
                this.logger.warn(`Could not remove unstarted container ${spec.name}: ${toError(cleanupError).message}`);
            });
            throw startError;
        }
        return container.id;
    }

    public async stop(containerId: string): Promise<void> {
        try {
            await this.docker.getContainer(containerId).stop();
        } catch (error) {
            if (!hasStatusCode(error, 304)) {
                throw this.failure("stop", containerId, error);
            }
        }
    }

    public async remove(containerId: string, force: boolean): Promise<void> {
        try {
            await this.docker.getContainer(containerId).remove({ force });
        } catch (error) {
            if (!hasStatusCode(error, 404)) {
                throw this.failure("remove", containerId, error);
            }
        }
    }

    public async listByStackLabel(stackName: string): Promise<ContainerInfo[]> {
        return this.call("list", stackName, async () => {
            const containers = await this.docker.listContainers({
                all: true,
                filters: { label: [`${STACK_LABEL}=${stackName}`] }
            });
            return containers.map(toContainerInfo);
        });
    }

    public async stopStackContainers(stackName: string): Promise<string[]> {
        const containers = await this.listByStackLabel(stackName);
        const stopped: string[] = [];
        for (const container of containers) {
            if (container.labels[MAINTENANCE_LABEL] === MAINTENANCE_IGNORE || container.state !== "running") {
                continue;
            }
            await this.stop(container.id);
            stopped.push(container.id);
        }
        return stopped;
    }

    public async startStackContainers(stackName: string): Promise<string[]> {
        const containers = await this.listByStackLabel(stackName);
        const started: string[] = [];
        for (const container of containers) {
            if (container.labels[MAINTENANCE_LABEL] === MAINTENANCE_IGNORE || container.state === "running") {
                continue;
            }
            try {
                await this.docker.getContainer(container.id).start();
            } catch (error) {
                if (!hasStatusCode(error, 304)) {
                    throw this.failure("start", container.name, error);
                }
            }
            started.push(container.id);
        }
        return started;
    }

    public async getExitCode(containerId: string): Promise<number | undefined> {
        try {
            const details = await this.docker.getContainer(containerId).inspect();
            return details.State.Running ? undefined : details.State.ExitCode;
        } catch (error) {
            if (hasStatusCode(error, 404)) {
                return undefined;
            }
            throw this.failure("inspect", containerId, error);
        }
    }

    private async call<T>(operation: RuntimeOperation, resource: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            throw this.failure(operation, resource, error);
        }
    }

    private failure(operation: RuntimeOperation, resource: string, error: unknown): RuntimeOperationError {
        if (error instanceof RuntimeOperationError) {
            return error;
        }
        const cause = toError(error);
        this.logger.runtimeOperationFailure(operation, resource, cause);
        return new RuntimeOperationError("DockerRuntimeDriver", this.environmentId, operation, resource, cause.message);
    }
}

/**
 * Engine client options for an environment's endpoint
 */
export function dockerOptions(endpoint: DockerEndpointConfig): Docker.DockerOptions {
    if (endpoint.host) {
        return { host: endpoint.host, port: endpoint.port, protocol: endpoint.protocol };
    }
    return { socketPath: endpoint.socketPath };
}

/**
 * One cached driver per configured environment
 */
export class DockerDriverProvider implements DriverProvider {
    private readonly drivers = new Map<string, DockerRuntimeDriver>();
    private readonly environments: Map<string, EnvironmentConfig>;

    constructor(
        environments: readonly EnvironmentConfig[],
        private readonly createClient: (endpoint: DockerEndpointConfig) => Docker = endpoint => new Docker(dockerOptions(endpoint))
    ) {
        this.environments = new Map(environments.map(environment => [environment.id, environment]));
    }

    public getDriver(environmentId: string): DockerRuntimeDriver {
        const cached = this.drivers.get(environmentId);
        if (cached) {
            return cached;
        }

        const environment = this.environments.get(environmentId);
        if (!environment) {
            throw new ValidationError("DockerDriverProvider", environmentId, "environmentId",
                `Unknown environment '${environmentId}' (configured: ${[...this.environments.keys()].join(", ") || "none"})`);
        }

        const driver = new DockerRuntimeDriver(this.createClient(environment.docker), environmentId);
        this.drivers.set(environmentId, driver);
        return driver;
    }
}
