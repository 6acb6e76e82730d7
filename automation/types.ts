/**
 * Domain types for stack and product deployment orchestration
 */

export type VariableMap = Readonly<Record<string, string>>;

export enum StackStatus {
    /** Standalone stack that has never been deployed */
    NOT_DEPLOYED = 'NotDeployed',
    /** Stack of a product that has not been attempted yet */
    PENDING = 'Pending',
    DEPLOYING = 'Deploying',
    UPGRADING = 'Upgrading',
    RUNNING = 'Running',
    FAILED = 'Failed',
    REMOVING = 'Removing',
    REMOVED = 'Removed'
}

export enum ProductStatus {
    DEPLOYING = 'Deploying',
    RUNNING = 'Running',
    PARTIALLY_RUNNING = 'PartiallyRunning',
    UPGRADING = 'Upgrading',
    FAILED = 'Failed',
    REMOVING = 'Removing',
    REMOVED = 'Removed'
}

export enum OperationMode {
    NORMAL = 'Normal',
    MAINTENANCE = 'Maintenance'
}

export type ProgressPhase =
    | 'deploying'
    | 'pulling'
    | 'starting'
    | 'upgrading'
    | 'rolling_back'
    | 'removing'
    | 'completed'
    | 'error';

// ---------------------------------------------------------------------------
// Deployment plans (driver-ready, produced by the manifest resolver)
// ---------------------------------------------------------------------------

export interface ServiceSpec {
    name: string;
    containerName: string;
    image: string;
    environment: Readonly<Record<string, string>>;
    ports: readonly string[];
    volumes: readonly string[];
    /** Fully-qualified network names; empty means the stack's default network */
    networks: readonly string[];
    labels: Readonly<Record<string, string>>;
    command?: readonly string[];
    restartPolicy?: string;
}

export interface NetworkSpec {
    name: string;
    external: boolean;
}

export interface DeploymentPlan {
    stackName: string;
    version: string;
    services: readonly ServiceSpec[];
    networks: readonly NetworkSpec[];
    volumes: readonly string[];
}

/**
 * What the runtime driver needs to create one container
 */
export interface ContainerSpec {
    name: string;
    image: string;
    environment: Readonly<Record<string, string>>;
    ports: readonly string[];
    volumes: readonly string[];
    networks: readonly string[];
    labels: Readonly<Record<string, string>>;
    command?: readonly string[];
    restartPolicy?: string;
}

export interface ContainerInfo {
    id: string;
    name: string;
    image: string;
    state: string;
    labels: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export interface VariableDefinition {
    name: string;
    defaultValue?: string;
    description?: string;
}

export interface StackDefinition {
    /** Stable across product versions */
    id: string;
    name: string;
    variables: readonly VariableDefinition[];
    /** Compose-style manifest source, interpreted only by the manifest resolver */
    manifest: string;
}

export interface ProductDefinition {
    /** `${groupId}:${version}` */
    id: string;
    groupId: string;
    name: string;
    version: string;
    description?: string;
    /** Declaration order is deployment order */
    stacks: readonly StackDefinition[];
}

// ---------------------------------------------------------------------------
// Persisted records. Records are immutable; every change produces a new record.
// ---------------------------------------------------------------------------

export interface PhaseRecord {
    readonly phase: string;
    readonly message: string;
    readonly timestamp: string;
}

export interface StackDeployment {
    readonly id: string;
    readonly environmentId: string;
    readonly productDeploymentId?: string;
    /** Catalog stack id */
    readonly stackId: string;
    readonly stackName: string;
    /** Operator-chosen, unique per environment, used as the `stack` label */
    readonly deploymentName: string;
    readonly status: StackStatus;
    readonly version: string;
    readonly order: number;
    readonly variables: VariableMap;
    readonly services: readonly ServiceSpec[];
    readonly networks: readonly NetworkSpec[];
    readonly volumes: readonly string[];
    readonly operationMode: OperationMode;
    readonly isNewInUpgrade: boolean;
    readonly startedServices: number;
    readonly startedAt?: string;
    readonly completedAt?: string;
    readonly errorMessage?: string;
}

export interface ProductDeployment {
    readonly id: string;
    readonly environmentId: string;
    readonly productGroupId: string;
    readonly productId: string;
    readonly productName: string;
    readonly productVersion: string;
    readonly status: ProductStatus;
    /** Fixed order; upgrades only append */
    readonly stackDeploymentIds: readonly string[];
    readonly sharedVariables: VariableMap;
    readonly continueOnError: boolean;
    readonly sessionId: string;
    readonly upgradeCount: number;
    readonly previousVersion?: string;
    readonly lastUpgradedAt?: string;
    readonly totalStacks: number;
    readonly completedStacks: number;
    readonly failedStacks: number;
    readonly removedStacks: number;
    readonly errorMessage?: string;
    readonly createdAt: string;
    readonly updatedAt: string;
    readonly completedAt?: string;
    readonly phaseHistory: readonly PhaseRecord[];
}

export interface SnapshotEntry {
    readonly stackDeploymentId: string;
    readonly stackId: string;
    readonly deploymentName: string;
    readonly order: number;
    readonly version: string;
    readonly status: StackStatus;
    readonly variables: VariableMap;
    readonly plan: DeploymentPlan;
    readonly operationMode: OperationMode;
    /** False once the stack has crossed its point of no return */
    readonly valid: boolean;
}

export interface DeploymentSnapshot {
    readonly productDeploymentId: string;
    readonly productId: string;
    readonly productVersion: string;
    readonly previousStatus: ProductStatus;
    readonly sharedVariables: VariableMap;
    readonly capturedAt: string;
    readonly entries: readonly SnapshotEntry[];
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface StackConfigRequest {
    stackId: string;
    deploymentStackName: string;
    variables?: Record<string, string>;
}

export interface DeployProductRequest {
    productId: string;
    environmentId: string;
    stackConfigs: StackConfigRequest[];
    sharedVariables?: Record<string, string>;
    sessionId?: string;
    continueOnError?: boolean;
    forceRefresh?: boolean;
}

export interface UpgradeStackConfig {
    stackId: string;
    /** Only used for stacks the target version adds */
    deploymentStackName?: string;
    variables?: Record<string, string>;
}

export interface UpgradeProductRequest {
    targetVersion: string;
    sharedVariables?: Record<string, string>;
    stackConfigs?: UpgradeStackConfig[];
    sessionId?: string;
    forceRefresh?: boolean;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface StackResult {
    stackDeploymentId: string;
    stackName: string;
    success: boolean;
    status: StackStatus;
    startedServices: number;
    totalServices: number;
    /** At least one new container of this stack started during the run */
    pointOfNoReturnCrossed: boolean;
    cancelled: boolean;
    duration: number;
    error?: string;
    failedService?: string;
    affectedContainers?: number;
}

export type ProductOperation = 'deploy' | 'upgrade' | 'rollback' | 'remove' | 'operation-mode' | 'mark-failed';

export interface ProductOperationSummary {
    operation: ProductOperation;
    deployment: ProductDeployment;
    stacks: StackDeployment[];
    results: StackResult[];
    totalStacks: number;
    completedStacks: number;
    failedStacks: number;
    cancelled: boolean;
    snapshotRetained: boolean;
    requiresManualIntervention: boolean;
    /** Image pulls attempted again after a failure */
    retryCount: number;
    hasErrors: boolean;
    totalDuration: number;
}

export interface ProductDeploymentStatus {
    deployment: ProductDeployment;
    stacks: StackDeployment[];
    hasSnapshot: boolean;
    rollbackVersion?: string;
}

export interface AvailableVersion {
    version: string;
    productId: string;
    stackCount: number;
}

export interface UpgradeCheckResult {
    productDeploymentId: string;
    currentVersion: string;
    upgradeAvailable: boolean;
    latestVersion?: string;
    availableVersions: AvailableVersion[];
    newStacks: string[];
    removedStacks: string[];
    message: string;
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export interface ProgressEvent {
    deploymentId: string;
    sessionId: string;
    phase: ProgressPhase;
    message: string;
    percentComplete: number;
    stackName?: string;
    stackIndex?: number;
    totalStacks?: number;
    currentService?: string;
    totalServices: number;
    completedServices: number;
    isError: boolean;
    timestamp: string;
}

export interface OperationOptions {
    /** Cooperative cancellation, checked between stacks and between services */
    signal?: AbortSignal;
    /** Correlates progress events; generated when omitted */
    sessionId?: string;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DockerEndpointConfig {
    socketPath?: string;
    host?: string;
    port?: number;
    protocol?: 'http' | 'https' | 'ssh';
}

export interface EnvironmentConfig {
    id: string;
    name: string;
    docker: DockerEndpointConfig;
}

export interface DeploymentDefaults {
    continueOnError: boolean;
    forceRefresh: boolean;
    pullRetries: number;
    pullRetryDelay: number;
}

export interface OrchestratorConfig {
    environments: EnvironmentConfig[];
    catalogPath: string;
    stateDir: string;
    deploymentDefaults: DeploymentDefaults;
}
