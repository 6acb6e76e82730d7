import {
    ContainerInfo,
    ContainerSpec,
    DeploymentPlan,
    DeploymentSnapshot,
    ProductDefinition,
    ProductDeployment,
    ProgressEvent,
    StackDeployment
} from '../../automation/types';

/**
 * Contracts for the collaborators the orchestration core drives
 */

/**
 * Container operations against one environment's container engine.
 * Every method rejects with a RuntimeOperationError on failure.
 */
export interface ContainerRuntimeDriver {
    pullImage(ref: string): Promise<void>;
    imageExists(ref: string): Promise<boolean>;
    ensureNetwork(name: string): Promise<void>;
    findContainerByName(name: string): Promise<ContainerInfo | undefined>;
    /** Resolves with the new container id once it is running */
    createAndStart(spec: ContainerSpec): Promise<string>;
    stop(containerId: string): Promise<void>;
    remove(containerId: string, force: boolean): Promise<void>;
    listByStackLabel(stackName: string): Promise<ContainerInfo[]>;
    /** Skips containers labelled `maintenance=ignore`; resolves with the affected ids */
    stopStackContainers(stackName: string): Promise<string[]>;
    startStackContainers(stackName: string): Promise<string[]>;
    getExitCode(containerId: string): Promise<number | undefined>;
}

export interface DriverProvider {
    /** Throws ValidationError for an unknown environment */
    getDriver(environmentId: string): ContainerRuntimeDriver;
}

export interface ManifestResolver<TManifest = unknown> {
    parse(yaml: string): TManifest;
    toDeploymentPlan(manifest: TManifest, variables: Readonly<Record<string, string>>, stackName: string, version: string): DeploymentPlan;
}

export interface ProgressSink {
    publish(event: ProgressEvent): void | Promise<void>;
}

export interface ProductCatalog {
    getProduct(productId: string): Promise<ProductDefinition | undefined>;
    /** Every version of a product group, in catalog order */
    listProductVersions(groupId: string): Promise<ProductDefinition[]>;
}

export interface RecordChanges {
    product?: ProductDeployment;
    stacks?: readonly StackDeployment[];
    /** Stored alongside the records, replacing any snapshot of the same product */
    snapshot?: DeploymentSnapshot;
}

export interface DeploymentRepository {
    getProduct(id: string): Promise<ProductDeployment | undefined>;
    /** The single non-Removed product deployment of a group in an environment */
    findActiveProduct(environmentId: string, productGroupId: string): Promise<ProductDeployment | undefined>;
    listProducts(environmentId?: string): Promise<ProductDeployment[]>;
    /** Resolves in the order of `ids`; rejects when one is missing */
    getStacks(ids: readonly string[]): Promise<StackDeployment[]>;
    findActiveStackByDeploymentName(environmentId: string, deploymentName: string): Promise<StackDeployment | undefined>;
    /** Persists the given records as one unit */
    commit(changes: RecordChanges): Promise<void>;
    getSnapshot(productDeploymentId: string): Promise<DeploymentSnapshot | undefined>;
    deleteSnapshot(productDeploymentId: string): Promise<void>;
}
