import { ProductCatalog } from "../shared/interfaces";
import { ComponentLogger } from "../shared/utils/logging";
import { ConfigManager } from "../../automation/config-manager";
import { ProductDefinition } from "../../automation/types";

/**
 * Catalog over a fixed list of product definitions
 */
export class InMemoryProductCatalog implements ProductCatalog {
    protected products: ProductDefinition[];

    constructor(products: ProductDefinition[] = []) {
        this.products = [...products];
    }

    public async getProduct(productId: string): Promise<ProductDefinition | undefined> {
        return this.products.find(product => product.id === productId);
    }

    public async listProductVersions(groupId: string): Promise<ProductDefinition[]> {
        return this.products.filter(product => product.groupId === groupId);
    }

    public add(product: ProductDefinition): void {
        this.products = [...this.products.filter(existing => existing.id !== product.id), product];
    }
}

/**
 * Catalog read from a catalog.yaml file. The file is read once, on first use.
 */
export class FileProductCatalog extends InMemoryProductCatalog {
    private loaded = false;
    private readonly logger: ComponentLogger;

    constructor(private readonly catalogPath: string) {
        super();
        this.logger = new ComponentLogger("FileProductCatalog", catalogPath);
    }

    public async getProduct(productId: string): Promise<ProductDefinition | undefined> {
        this.ensureLoaded();
        return super.getProduct(productId);
    }

    public async listProductVersions(groupId: string): Promise<ProductDefinition[]> {
        this.ensureLoaded();
        return super.listProductVersions(groupId);
    }

    /**
     * Re-read the catalog file
     */
    public reload(): void {
        this.products = ConfigManager.loadCatalog(this.catalogPath);
        this.loaded = true;
        this.logger.debug(`Loaded ${this.products.length} product versions`);
    }

    private ensureLoaded(): void {
        if (!this.loaded) {
            this.reload();
        }
    }
}
