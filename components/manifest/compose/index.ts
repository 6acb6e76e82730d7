import * as yaml from "js-yaml";
import { ManifestResolver } from "../../shared/interfaces";
import { ValidationError, toError } from "../../shared/utils/error-handling";
import { containerName, networkName, sanitizeName } from "../../shared/utils/docker-naming";
import { DeploymentPlan, NetworkSpec, ServiceSpec } from "../../../automation/types";

const COMPONENT = "ComposeManifestResolver";

export interface ComposeService {
    name: string;
    image: string;
    environment: Record<string, string>;
    ports: string[];
    volumes: string[];
    networks: string[];
    labels: Record<string, string>;
    command?: string[];
    restart?: string;
}

export interface ComposeNetwork {
    key: string;
    external: boolean;
    /** Engine name of an external network */
    name?: string;
}

/**
 * A parsed compose document with every value still unsubstituted
 */
export interface ComposeManifest {
    services: ComposeService[];
    networks: ComposeNetwork[];
    volumes: string[];
}

type YamlObject = Record<string, unknown>;

function isRecord(value: unknown): value is YamlObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string | undefined {
    if (typeof value === "string") {
        return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    return undefined;
}

const VARIABLE_PATTERN = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?-)([^}]*))?\}/g;

/**
 * Replace `${NAME}`, `${NAME:-default}` and `${NAME-default}`; `$$` is a literal `$`.
 * An unknown name without a default becomes an empty string.
 */
export function substituteVariables(value: string, variables: Readonly<Record<string, string>>): string {
    return value.replace(VARIABLE_PATTERN, (match: string, name?: string, operator?: string, fallback?: string) => {
        if (match === "$$" || name === undefined) {
            return "$";
        }
        const current = variables[name];
        if (operator === ":-") {
            return current !== undefined && current !== "" ? current : fallback ?? "";
        }
        if (operator === "-") {
            return current ?? fallback ?? "";
        }
        return current ?? "";
    });
}

/**
 * Resolves compose-style stack manifests (`services`, `networks`, `volumes`) into deployment plans
 */
export class ComposeManifestResolver implements ManifestResolver<ComposeManifest> {
    public parse(source: string): ComposeManifest {
        let document: unknown;
        try {
            document = yaml.load(source);
        } catch (error) {
            throw new ValidationError(COMPONENT, "manifest", "manifest", `Invalid YAML: ${toError(error).message}`);
        }
        if (!isRecord(document) || !isRecord(document.services) || Object.keys(document.services).length === 0) {
            throw new ValidationError(COMPONENT, "manifest", "services", "Manifest must declare at least one service");
        }

        const networks = isRecord(document.networks)
            ? Object.entries(document.networks).map(([key, definition]) => this.parseNetwork(key, definition))
            : [];
        const volumes = isRecord(document.volumes) ? Object.keys(document.volumes) : [];

        const services = Object.entries(document.services).map(([name, definition]) => this.parseService(name, definition));
        const declared = new Set(networks.map(network => network.key));
        for (const service of services) {
            for (const network of service.networks) {
                if (!declared.has(network)) {
                    throw new ValidationError(COMPONENT, service.name, "networks", `Service '${service.name}' uses undeclared network '${network}'`);
                }
            }
        }

        return { services, networks, volumes };
    }

    public toDeploymentPlan(
        manifest: ComposeManifest,
        variables: Readonly<Record<string, string>>,
        stackName: string,
        version: string
    ): DeploymentPlan {
        const sub = (value: string): string => substituteVariables(value, variables);
        const namedVolumes = new Set(manifest.volumes);

        const networks: NetworkSpec[] = manifest.networks.map(network => ({
            name: network.external ? sub(network.name ?? network.key) : networkName(stackName, network.key),
            external: network.external
        }));
        const networkNames = new Map(manifest.networks.map((network, index) => [network.key, networks[index].name]));

        const services: ServiceSpec[] = manifest.services.map(service => {
            const image = sub(service.image);
            if (image.trim() === "") {
                throw new ValidationError(COMPONENT, stackName, "image", `Service '${service.name}' resolves to an empty image`);
            }

            const environment: Record<string, string> = {};
            for (const [name, value] of Object.entries(service.environment)) {
                environment[name] = sub(value);
            }
            const labels: Record<string, string> = {};
            for (const [name, value] of Object.entries(service.labels)) {
                labels[name] = sub(value);
            }

            return {
                name: service.name,
                containerName: containerName(stackName, service.name),
                image,
                environment,
                ports: service.ports.map(sub),
                volumes: service.volumes.map(entry => this.qualifyVolume(sub(entry), stackName, namedVolumes)),
                networks: service.networks.map(key => networkNames.get(key) ?? networkName(stackName, key)),
                labels,
                command: service.command?.map(sub),
                restartPolicy: service.restart
            };
        });

        return {
            stackName: sanitizeName(stackName),
            version,
            services,
            networks,
            volumes: manifest.volumes.map(volume => `${sanitizeName(stackName)}_${volume}`)
        };
    }

    private parseNetwork(key: string, definition: unknown): ComposeNetwork {
        if (!isRecord(definition)) {
            return { key, external: false };
        }
        const external = definition.external === true || isRecord(definition.external);
        const externalName = isRecord(definition.external) ? scalar(definition.external.name) : undefined;
        return {
            key,
            external,
            name: external ? scalar(definition.name) ?? externalName : undefined
        };
    }

    private parseService(name: string, definition: unknown): ComposeService {
        if (!isRecord(definition)) {
            throw new ValidationError(COMPONENT, name, "services", `Service '${name}' must be a mapping`);
        }
        const image = scalar(definition.image);
        if (!image) {
            throw new ValidationError(COMPONENT, name, "image", `Service '${name}' has no image`);
        }

        return {
            name,
            image,
            environment: this.keyValues(definition.environment),
            ports: this.strings(definition.ports),
            volumes: this.strings(definition.volumes),
            networks: Array.isArray(definition.networks)
                ? this.strings(definition.networks)
                : isRecord(definition.networks) ? Object.keys(definition.networks) : [],
            labels: this.keyValues(definition.labels),
            command: typeof definition.command === "string"
                ? definition.command.split(/\s+/).filter(part => part.length > 0)
                : Array.isArray(definition.command) ? this.strings(definition.command) : undefined,
            restart: scalar(definition.restart)
        };
    }

    /**
     * `KEY=value` list or mapping; a list entry without `=` gets an empty value
     */
    private keyValues(value: unknown): Record<string, string> {
        const result: Record<string, string> = {};
        if (Array.isArray(value)) {
            for (const entry of this.strings(value)) {
                const separator = entry.indexOf("=");
                if (separator < 0) {
                    result[entry] = "";
                } else {
                    result[entry.slice(0, separator)] = entry.slice(separator + 1);
                }
            }
        } else if (isRecord(value)) {
            for (const [key, entry] of Object.entries(value)) {
                result[key] = scalar(entry) ?? "";
            }
        }
        return result;
    }

    private strings(value: unknown): string[] {
        if (!Array.isArray(value)) {
            return [];
        }
        return value.map(scalar).filter((entry): entry is string => entry !== undefined);
    }

    /**
     * Prefix named volumes with the stack name; bind mounts pass through
     */
    private qualifyVolume(entry: string, stackName: string, namedVolumes: ReadonlySet<string>): string {
        const separator = entry.indexOf(":");
        if (separator < 0) {
            return entry;
        }
        const source = entry.slice(0, separator);
        if (!namedVolumes.has(source)) {
            return entry;
        }
        return `${sanitizeName(stackName)}_${source}${entry.slice(separator)}`;
    }
}
