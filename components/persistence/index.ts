import * as fs from "fs";
import * as path from "path";
import { DeploymentRepository, RecordChanges } from "../shared/interfaces";
import { ComponentLogger } from "../shared/utils/logging";
import { RolloutError, toError } from "../shared/utils/error-handling";
import {
    DeploymentSnapshot,
    ProductDeployment,
    ProductStatus,
    StackDeployment,
    StackStatus
} from "../../automation/types";

/**
 * Repository holding every record in process memory
 */
export class InMemoryDeploymentRepository implements DeploymentRepository {
    protected readonly products = new Map<string, ProductDeployment>();
    protected readonly stacks = new Map<string, StackDeployment>();
    protected readonly snapshots = new Map<string, DeploymentSnapshot>();

    public async getProduct(id: string): Promise<ProductDeployment | undefined> {
        return this.products.get(id);
    }

    public async findActiveProduct(environmentId: string, productGroupId: string): Promise<ProductDeployment | undefined> {
        for (const product of this.products.values()) {
            if (product.environmentId === environmentId
                && product.productGroupId === productGroupId
                && product.status !== ProductStatus.REMOVED) {
                return product;
            }
        }
        return undefined;
    }

    public async listProducts(environmentId?: string): Promise<ProductDeployment[]> {
        return [...this.products.values()]
            .filter(product => environmentId === undefined || product.environmentId === environmentId)
            .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    }

    public async getStacks(ids: readonly string[]): Promise<StackDeployment[]> {
        return ids.map(id => {
            const stack = this.stacks.get(id);
            if (!stack) {
                throw new RolloutError("DeploymentRepository", id, `Stack deployment '${id}' not found`, "RECORD_NOT_FOUND");
            }
            return stack;
        });
    }

    public async findActiveStackByDeploymentName(environmentId: string, deploymentName: string): Promise<StackDeployment | undefined> {
        for (const stack of this.stacks.values()) {
            if (stack.environmentId === environmentId
                && stack.deploymentName === deploymentName
                && stack.status !== StackStatus.REMOVED) {
                return stack;
            }
        }
        return undefined;
    }

    public async commit(changes: RecordChanges): Promise<void> {
        if (changes.product) {
            this.products.set(changes.product.id, changes.product);
        }
        for (const stack of changes.stacks ?? []) {
            this.stacks.set(stack.id, stack);
        }
        if (changes.snapshot) {
            this.snapshots.set(changes.snapshot.productDeploymentId, changes.snapshot);
        }
    }

    public async getSnapshot(productDeploymentId: string): Promise<DeploymentSnapshot | undefined> {
        return this.snapshots.get(productDeploymentId);
    }

    public async deleteSnapshot(productDeploymentId: string): Promise<void> {
        this.snapshots.delete(productDeploymentId);
    }
}

interface StateDocument {
    version: 1;
    products: ProductDeployment[];
    stacks: StackDeployment[];
    snapshots: DeploymentSnapshot[];
}

const PRODUCT_STATUSES: readonly string[] = Object.values(ProductStatus);
const STACK_STATUSES: readonly string[] = Object.values(StackStatus);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProductDeployment(value: unknown): value is ProductDeployment {
    return isRecord(value)
        && typeof value.id === "string"
        && typeof value.environmentId === "string"
        && typeof value.productGroupId === "string"
        && typeof value.status === "string" && PRODUCT_STATUSES.includes(value.status)
        && Array.isArray(value.stackDeploymentIds)
        && Array.isArray(value.phaseHistory);
}

function isStackDeployment(value: unknown): value is StackDeployment {
    return isRecord(value)
        && typeof value.id === "string"
        && typeof value.environmentId === "string"
        && typeof value.deploymentName === "string"
        && typeof value.status === "string" && STACK_STATUSES.includes(value.status)
        && Array.isArray(value.services);
}

function isSnapshot(value: unknown): value is DeploymentSnapshot {
    return isRecord(value)
        && typeof value.productDeploymentId === "string"
        && typeof value.productVersion === "string"
        && Array.isArray(value.entries);
}

function isStateDocument(value: unknown): value is StateDocument {
    return isRecord(value)
        && value.version === 1
        && Array.isArray(value.products) && value.products.every(isProductDeployment)
        && Array.isArray(value.stacks) && value.stacks.every(isStackDeployment)
        && Array.isArray(value.snapshots) && value.snapshots.every(isSnapshot);
}

function isMissingFile(error: unknown): boolean {
    return isRecord(error) && error.code === "ENOENT";
}

/**
 * Repository persisted as one JSON document under the state directory.
 * Every change rewrites the document through a temp file and a rename.
 */
export class FileDeploymentRepository extends InMemoryDeploymentRepository {
    public static readonly FILE_NAME = "deployments.json";

    private readonly filePath: string;
    private readonly logger: ComponentLogger;
    private loading?: Promise<void>;
    private writing: Promise<void> = Promise.resolve();

    constructor(stateDir: string) {
        super();
        this.filePath = path.join(stateDir, FileDeploymentRepository.FILE_NAME);
        this.logger = new ComponentLogger("FileDeploymentRepository", stateDir);
    }

    public async getProduct(id: string): Promise<ProductDeployment | undefined> {
        await this.load();
        return super.getProduct(id);
    }

    public async findActiveProduct(environmentId: string, productGroupId: string): Promise<ProductDeployment | undefined> {
        await this.load();
        return super.findActiveProduct(environmentId, productGroupId);
    }

    public async listProducts(environmentId?: string): Promise<ProductDeployment[]> {
        await this.load();
        return super.listProducts(environmentId);
    }

    public async getStacks(ids: readonly string[]): Promise<StackDeployment[]> {
        await this.load();
        return super.getStacks(ids);
    }

    public async findActiveStackByDeploymentName(environmentId: string, deploymentName: string): Promise<StackDeployment | undefined> {
        await this.load();
        return super.findActiveStackByDeploymentName(environmentId, deploymentName);
    }

    public async commit(changes: RecordChanges): Promise<void> {
        await this.load();
        await super.commit(changes);
        await this.persist();
    }

    public async getSnapshot(productDeploymentId: string): Promise<DeploymentSnapshot | undefined> {
        await this.load();
        return super.getSnapshot(productDeploymentId);
    }

    public async deleteSnapshot(productDeploymentId: string): Promise<void> {
        await this.load();
        await super.deleteSnapshot(productDeploymentId);
        await this.persist();
    }

    private load(): Promise<void> {
        if (!this.loading) {
            this.loading = this.readDocument();
        }
        return this.loading;
    }

    private async readDocument(): Promise<void> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.filePath, "utf8");
        } catch (error) {
            if (isMissingFile(error)) {
                this.logger.debug("No state file yet, starting empty");
                return;
            }
            throw new RolloutError("FileDeploymentRepository", this.filePath, `Cannot read state: ${toError(error).message}`, "STATE_READ_FAILED");
        }

        let document: unknown;
        try {
            document = JSON.parse(content);
        } catch (error) {
            throw new RolloutError("FileDeploymentRepository", this.filePath, `State file is not valid JSON: ${toError(error).message}`, "STATE_READ_FAILED");
        }
        if (!isStateDocument(document)) {
            throw new RolloutError("FileDeploymentRepository", this.filePath, "State file has an unexpected shape", "STATE_READ_FAILED");
        }

        document.products.forEach(product => this.products.set(product.id, product));
        document.stacks.forEach(stack => this.stacks.set(stack.id, stack));
        document.snapshots.forEach(snapshot => this.snapshots.set(snapshot.productDeploymentId, snapshot));
        this.logger.debug(`Loaded ${document.products.length} product deployments`);
    }

    /**
     * Writes are queued so renames never interleave
     */
    private persist(): Promise<void> {
        const document: StateDocument = {
            version: 1,
            products: [...this.products.values()],
            stacks: [...this.stacks.values()],
            snapshots: [...this.snapshots.values()]
        };
        const next = this.writing.then(() => this.writeDocument(document));
        this.writing = next.catch((error: unknown) => {
            this.logger.debug(`Earlier state write failed: ${toError(error).message}`);
        });
        return next;
    }

    private async writeDocument(document: StateDocument): Promise<void> {
        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        try {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.promises.writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
            await fs.promises.rename(tempPath, this.filePath);
        } catch (error) {
            throw new RolloutError("FileDeploymentRepository", this.filePath, `Cannot write state: ${toError(error).message}`, "STATE_WRITE_FAILED");
        }
    }
}
