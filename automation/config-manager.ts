import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigurationError, toError } from '../components/shared/utils/error-handling';
import {
    DeploymentDefaults,
    DeployProductRequest,
    DockerEndpointConfig,
    EnvironmentConfig,
    OrchestratorConfig,
    ProductDefinition,
    StackConfigRequest,
    StackDefinition,
    UpgradeProductRequest,
    UpgradeStackConfig,
    VariableDefinition
} from './types';

type YamlObject = Record<string, unknown>;

const COMPONENT = 'ConfigManager';

export const DEFAULT_STATE_DIR = '.stack-rollout';
export const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';

export const DEFAULT_DEPLOYMENT_DEFAULTS: DeploymentDefaults = {
    continueOnError: false,
    forceRefresh: false,
    pullRetries: 2,
    pullRetryDelay: 1000
};

function isRecord(value: unknown): value is YamlObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a YAML document field by field, raising ConfigurationError with the
 * offending path on the first bad value.
 */
class YamlReader {
    constructor(private readonly source: string) {}

    public fail(where: string, message: string): never {
        throw new ConfigurationError(COMPONENT, path.basename(this.source), this.source, `${where}: ${message}`);
    }

    public object(value: unknown, where: string): YamlObject {
        if (!isRecord(value)) {
            this.fail(where, 'expected a mapping');
        }
        return value;
    }

    public string(obj: YamlObject, key: string, where: string): string {
        const value = this.optionalString(obj, key, where);
        if (value === undefined || value === '') {
            this.fail(`${where}.${key}`, 'is required');
        }
        return value;
    }

    public optionalString(obj: YamlObject, key: string, where: string): string | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number' || typeof value === 'boolean') {
            return String(value);
        }
        this.fail(`${where}.${key}`, 'expected a string');
    }

    public boolean(obj: YamlObject, key: string, where: string): boolean | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value === 'boolean') {
            return value;
        }
        if (value === 'true' || value === 'false') {
            return value === 'true';
        }
        this.fail(`${where}.${key}`, 'expected true or false');
    }

    public number(obj: YamlObject, key: string, where: string): number | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
        if (!Number.isFinite(parsed) || parsed < 0) {
            this.fail(`${where}.${key}`, 'expected a non-negative number');
        }
        return parsed;
    }

    /**
     * A map of scalar values. Numbers and booleans are kept as their string form.
     */
    public stringMap(obj: YamlObject, key: string, where: string): Record<string, string> | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        const map = this.object(value, `${where}.${key}`);
        const result: Record<string, string> = {};
        for (const name of Object.keys(map)) {
            const entry = this.optionalString(map, name, `${where}.${key}`);
            result[name] = entry ?? '';
        }
        return result;
    }

    /**
     * A list, or a mapping whose keys fill in the given name field of each entry
     */
    public list(obj: YamlObject, key: string, where: string, nameField?: string): YamlObject[] {
        const value = obj[key];
        if (value === undefined || value === null) {
            return [];
        }
        if (Array.isArray(value)) {
            return value.map((entry, index) => this.object(entry, `${where}.${key}[${index}]`));
        }
        if (nameField && isRecord(value)) {
            return Object.entries(value).map(([name, entry]) => {
                const item: YamlObject = isRecord(entry) ? entry : { default: entry };
                return { ...item, [nameField]: item[nameField] ?? name };
            });
        }
        this.fail(`${where}.${key}`, 'expected a list');
    }
}

/**
 * Configuration management for the orchestrator, the product catalog and operation requests
 */
export class ConfigManager {
    /**
     * Load the orchestrator configuration. `${VAR}` and `$VAR` references are replaced
     * from the process environment first; relative paths resolve against the file's directory.
     */
    public static loadConfig(configPath: string): OrchestratorConfig {
        const reader = new YamlReader(configPath);
        const document = reader.object(this.parseYaml(configPath, true), 'config');
        const baseDir = path.dirname(path.resolve(configPath));

        const environments = reader.list(document, 'environments', 'config', 'id').map((entry, index) =>
            this.readEnvironment(reader, entry, `environments[${index}]`));

        const defaults = isRecord(document.deploymentDefaults) ? document.deploymentDefaults : {};
        const config = this.createConfig(environments, {
            catalogPath: reader.string(document, 'catalogPath', 'config'),
            stateDir: reader.optionalString(document, 'stateDir', 'config'),
            deploymentDefaults: {
                continueOnError: reader.boolean(defaults, 'continueOnError', 'deploymentDefaults'),
                forceRefresh: reader.boolean(defaults, 'forceRefresh', 'deploymentDefaults'),
                pullRetries: reader.number(defaults, 'pullRetries', 'deploymentDefaults'),
                pullRetryDelay: reader.number(defaults, 'pullRetryDelay', 'deploymentDefaults')
            }
        }, configPath);

        return {
            ...config,
            catalogPath: path.resolve(baseDir, config.catalogPath),
            stateDir: path.resolve(baseDir, config.stateDir)
        };
    }

    /**
     * Build and validate a configuration programmatically
     */
    public static createConfig(
        environments: EnvironmentConfig[],
        options: {
            catalogPath: string;
            stateDir?: string;
            deploymentDefaults?: Partial<DeploymentDefaults>;
        },
        source: string = 'inline'
    ): OrchestratorConfig {
        const reader = new YamlReader(source);
        if (environments.length === 0) {
            reader.fail('environments', 'at least one environment is required');
        }

        const ids = new Set<string>();
        for (const environment of environments) {
            if (ids.has(environment.id)) {
                reader.fail('environments', `duplicate environment id '${environment.id}'`);
            }
            ids.add(environment.id);
        }

        return {
            environments,
            catalogPath: options.catalogPath,
            stateDir: options.stateDir ?? DEFAULT_STATE_DIR,
            deploymentDefaults: {
                continueOnError: options.deploymentDefaults?.continueOnError ?? DEFAULT_DEPLOYMENT_DEFAULTS.continueOnError,
                forceRefresh: options.deploymentDefaults?.forceRefresh ?? DEFAULT_DEPLOYMENT_DEFAULTS.forceRefresh,
                pullRetries: options.deploymentDefaults?.pullRetries ?? DEFAULT_DEPLOYMENT_DEFAULTS.pullRetries,
                pullRetryDelay: options.deploymentDefaults?.pullRetryDelay ?? DEFAULT_DEPLOYMENT_DEFAULTS.pullRetryDelay
            }
        };
    }

    /**
     * Load the product catalog. No environment substitution: manifests carry their own `${VAR}` references.
     */
    public static loadCatalog(catalogPath: string): ProductDefinition[] {
        return this.parseCatalog(this.readFile(catalogPath), catalogPath);
    }

    public static parseCatalog(content: string, source: string = 'catalog'): ProductDefinition[] {
        const reader = new YamlReader(source);
        const document = reader.object(this.loadYaml(content, source), 'catalog');
        const products = reader.list(document, 'products', 'catalog');

        const ids = new Set<string>();
        return products.map((entry, index) => {
            const product = this.readProduct(reader, entry, `products[${index}]`);
            if (ids.has(product.id)) {
                reader.fail(`products[${index}]`, `duplicate product '${product.id}'`);
            }
            ids.add(product.id);
            return product;
        });
    }

    public static loadDeployRequest(requestPath: string): DeployProductRequest {
        const reader = new YamlReader(requestPath);
        const document = reader.object(this.parseYaml(requestPath, true), 'request');

        const stackConfigs = reader.list(document, 'stackConfigs', 'request').map((entry, index): StackConfigRequest => ({
            stackId: reader.string(entry, 'stackId', `stackConfigs[${index}]`),
            deploymentStackName: reader.string(entry, 'deploymentStackName', `stackConfigs[${index}]`),
            variables: reader.stringMap(entry, 'variables', `stackConfigs[${index}]`)
        }));
        if (stackConfigs.length === 0) {
            reader.fail('request.stackConfigs', 'at least one stack is required');
        }

        return {
            productId: reader.string(document, 'productId', 'request'),
            environmentId: reader.string(document, 'environmentId', 'request'),
            stackConfigs,
            sharedVariables: reader.stringMap(document, 'sharedVariables', 'request'),
            sessionId: reader.optionalString(document, 'sessionId', 'request'),
            continueOnError: reader.boolean(document, 'continueOnError', 'request'),
            forceRefresh: reader.boolean(document, 'forceRefresh', 'request')
        };
    }

    public static loadUpgradeRequest(requestPath: string): UpgradeProductRequest {
        const reader = new YamlReader(requestPath);
        const document = reader.object(this.parseYaml(requestPath, true), 'request');

        const stackConfigs = reader.list(document, 'stackConfigs', 'request').map((entry, index): UpgradeStackConfig => ({
            stackId: reader.string(entry, 'stackId', `stackConfigs[${index}]`),
            deploymentStackName: reader.optionalString(entry, 'deploymentStackName', `stackConfigs[${index}]`),
            variables: reader.stringMap(entry, 'variables', `stackConfigs[${index}]`)
        }));

        return {
            targetVersion: reader.string(document, 'targetVersion', 'request'),
            sharedVariables: reader.stringMap(document, 'sharedVariables', 'request'),
            stackConfigs: stackConfigs.length > 0 ? stackConfigs : undefined,
            sessionId: reader.optionalString(document, 'sessionId', 'request'),
            forceRefresh: reader.boolean(document, 'forceRefresh', 'request')
        };
    }

    private static readEnvironment(reader: YamlReader, entry: YamlObject, where: string): EnvironmentConfig {
        const id = reader.string(entry, 'id', where);
        const docker = isRecord(entry.docker) ? entry.docker : {};
        const endpoint: DockerEndpointConfig = {};

        const host = reader.optionalString(docker, 'host', `${where}.docker`);
        if (host) {
            endpoint.host = host;
            endpoint.port = reader.number(docker, 'port', `${where}.docker`);
            const protocol = reader.optionalString(docker, 'protocol', `${where}.docker`);
            if (protocol !== undefined) {
                if (protocol !== 'http' && protocol !== 'https' && protocol !== 'ssh') {
                    reader.fail(`${where}.docker.protocol`, `expected http, https or ssh, got '${protocol}'`);
                }
                endpoint.protocol = protocol;
            }
        } else {
            endpoint.socketPath = reader.optionalString(docker, 'socketPath', `${where}.docker`) ?? DEFAULT_SOCKET_PATH;
        }

        return {
            id,
            name: reader.optionalString(entry, 'name', where) ?? id,
            docker: endpoint
        };
    }

    private static readProduct(reader: YamlReader, entry: YamlObject, where: string): ProductDefinition {
        const groupId = reader.string(entry, 'groupId', where);
        const version = reader.string(entry, 'version', where);
        const stacks = reader.list(entry, 'stacks', where, 'id').map((stack, index) =>
            this.readStack(reader, stack, `${where}.stacks[${index}]`));

        if (stacks.length === 0) {
            reader.fail(`${where}.stacks`, 'a product needs at least one stack');
        }
        const stackIds = new Set<string>();
        for (const stack of stacks) {
            if (stackIds.has(stack.id)) {
                reader.fail(`${where}.stacks`, `duplicate stack id '${stack.id}'`);
            }
            stackIds.add(stack.id);
        }

        return {
            id: `${groupId}:${version}`,
            groupId,
            name: reader.optionalString(entry, 'name', where) ?? groupId,
            version,
            description: reader.optionalString(entry, 'description', where),
            stacks
        };
    }

    private static readStack(reader: YamlReader, entry: YamlObject, where: string): StackDefinition {
        const id = reader.string(entry, 'id', where);
        const variables = reader.list(entry, 'variables', where, 'name').map((variable, index): VariableDefinition => ({
            name: reader.string(variable, 'name', `${where}.variables[${index}]`),
            defaultValue: reader.optionalString(variable, 'default', `${where}.variables[${index}]`),
            description: reader.optionalString(variable, 'description', `${where}.variables[${index}]`)
        }));

        const manifest = entry.manifest;
        let source: string;
        if (typeof manifest === 'string' && manifest.trim() !== '') {
            source = manifest;
        } else if (isRecord(manifest)) {
            source = yaml.dump(manifest, { indent: 2, lineWidth: 120, noRefs: true });
        } else {
            reader.fail(`${where}.manifest`, 'is required');
        }

        return {
            id,
            name: reader.optionalString(entry, 'name', where) ?? id,
            variables,
            manifest: source
        };
    }

    private static parseYaml(filePath: string, substitute: boolean): unknown {
        let content = this.readFile(filePath);
        if (substitute) {
            content = this.substituteEnvironmentVariables(content, filePath);
        }
        return this.loadYaml(content, filePath);
    }

    private static readFile(filePath: string): string {
        try {
            return fs.readFileSync(filePath, 'utf8');
        } catch (error) {
            throw new ConfigurationError(COMPONENT, path.basename(filePath), filePath, `cannot read file: ${toError(error).message}`);
        }
    }

    private static loadYaml(content: string, source: string): unknown {
        try {
            return yaml.load(content);
        } catch (error) {
            throw new ConfigurationError(COMPONENT, path.basename(source), source, `invalid YAML: ${toError(error).message}`);
        }
    }

    /**
     * Substitute environment variables in configuration content
     * Supports ${VAR_NAME} and $VAR_NAME syntax
     */
    private static substituteEnvironmentVariables(content: string, source: string): string {
        const lookup = (varName: string): string => {
            const value = process.env[varName];
            if (value === undefined) {
                throw new ConfigurationError(COMPONENT, path.basename(source), source,
                    `environment variable ${varName} is not defined`, { variable: varName });
            }
            return value;
        };

        return content
            .replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => lookup(varName))
            .replace(/\$([A-Z_][A-Z0-9_]*)\b/g, (_match, varName: string) => lookup(varName));
    }
}
