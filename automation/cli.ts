#!/usr/bin/env node

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { StackRollout } from '../index';
import { ConfigManager } from './config-manager';
import { ComposeManifestResolver } from '../components/manifest/compose';
import { ConsoleProgressReporter } from '../components/progress';
import { ValidationError, ValidationUtils, toError } from '../components/shared/utils/error-handling';
import {
    OperationMode,
    OperationOptions,
    ProductDeploymentStatus,
    ProductOperationSummary,
    ProductStatus,
    UpgradeCheckResult,
    UpgradeProductRequest
} from './types';

type CliOptions = Record<string, string | boolean>;

const VALUE_OPTIONS = ['config', 'request', 'deployment', 'version', 'mode', 'reason', 'environment', 'session'];
const FLAG_OPTIONS = ['force', 'continue-on-error', 'force-refresh'];

export const DEFAULT_CONFIG_PATHS = [
    'stack-rollout.yaml',
    'stack-rollout.yml',
    'config/stack-rollout.yaml'
];

export interface CliOutput {
    log(message: string): void;
    error(message: string): void;
}

/**
 * Command line interface over StackRollout. `run` resolves with the process exit code.
 */
export class RolloutCLI {
    constructor(
        private readonly createRollout: (configPath: string) => StackRollout = configPath => StackRollout.fromConfig(configPath),
        private readonly out: CliOutput = console
    ) {}

    async run(args: string[] = process.argv.slice(2)): Promise<number> {
        if (args.length === 0) {
            this.printHelp();
            return 0;
        }

        const command = args[0];
        const options = this.parseOptions(args.slice(1));

        try {
            switch (command) {
                case 'deploy':
                    return await this.handleDeploy(options);
                case 'upgrade':
                    return await this.handleUpgrade(options);
                case 'rollback':
                    return await this.handleRollback(options);
                case 'remove':
                    return await this.handleRemove(options);
                case 'maintenance':
                    return await this.handleMaintenance(options);
                case 'mark-failed':
                    return await this.handleMarkFailed(options);
                case 'check-upgrade':
                    return await this.handleCheckUpgrade(options);
                case 'status':
                    return await this.handleStatus(options);
                case 'validate':
                    return this.handleValidate(options);
                case 'help':
                    this.printHelp();
                    return 0;
                default:
                    this.out.error(`Unknown command: ${command}`);
                    this.printHelp();
                    return 1;
            }
        } catch (error) {
            this.out.error(`❌ Command failed: ${toError(error).message}`);
            return 1;
        }
    }

    private async handleDeploy(options: CliOptions): Promise<number> {
        const requestPath = this.requireOption(options, 'request');
        const request = ConfigManager.loadDeployRequest(requestPath);
        const rollout = this.openRollout(options);

        this.out.log(`🚀 Deploying ${request.productId} to ${request.environmentId}`);
        const summary = await this.withProgress(rollout, signal => rollout.deploy({
            ...request,
            continueOnError: options['continue-on-error'] === true ? true : request.continueOnError,
            forceRefresh: options['force-refresh'] === true ? true : request.forceRefresh,
            sessionId: this.stringOption(options, 'session') ?? request.sessionId
        }, { signal }));

        return this.printSummary(summary);
    }

    private async handleUpgrade(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        const requestPath = this.stringOption(options, 'request');
        const fromFile: Partial<UpgradeProductRequest> = requestPath ? ConfigManager.loadUpgradeRequest(requestPath) : {};
        const targetVersion = this.stringOption(options, 'version') ?? fromFile.targetVersion;
        if (!targetVersion) {
            throw new ValidationError('RolloutCLI', 'upgrade', 'version', '--version or a request file with targetVersion is required');
        }

        const rollout = this.openRollout(options);
        this.out.log(`⬆️  Upgrading ${deploymentId} to ${targetVersion}`);
        const summary = await this.withProgress(rollout, signal => rollout.upgrade(deploymentId, {
            ...fromFile,
            targetVersion,
            forceRefresh: options['force-refresh'] === true ? true : fromFile.forceRefresh,
            sessionId: this.stringOption(options, 'session') ?? fromFile.sessionId
        }, { signal }));

        return this.printSummary(summary);
    }

    private async handleRollback(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        const rollout = this.openRollout(options);

        this.out.log(`🔄 Rolling back ${deploymentId}`);
        const summary = await this.withProgress(rollout, signal => rollout.rollback(deploymentId, this.operationOptions(options, signal)));
        return this.printSummary(summary);
    }

    private async handleRemove(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        if (options.force !== true) {
            this.out.log('⚠️  This will stop and remove every container of the product deployment.');
            this.out.log('Use --force to confirm removal.');
            return 0;
        }

        const rollout = this.openRollout(options);
        this.out.log(`🗑️  Removing ${deploymentId}`);
        const summary = await this.withProgress(rollout, signal => rollout.remove(deploymentId, this.operationOptions(options, signal)));
        return this.printSummary(summary);
    }

    private async handleMaintenance(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        const modeName = ValidationUtils.validateEnum(this.requireOption(options, 'mode').toLowerCase(), 'mode',
            ['normal', 'maintenance'] as const, 'RolloutCLI', 'maintenance');
        const mode = modeName === 'maintenance' ? OperationMode.MAINTENANCE : OperationMode.NORMAL;

        const rollout = this.openRollout(options);
        const summary = await rollout.changeOperationMode(deploymentId, mode, this.stringOption(options, 'reason'));
        this.out.log(`🛠️  Operation mode of ${deploymentId} set to ${mode}`);
        return this.printSummary(summary);
    }

    private async handleMarkFailed(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        const rollout = this.openRollout(options);

        const summary = await rollout.markFailed(deploymentId, this.stringOption(options, 'reason'));
        this.out.log(`🛑 Marked ${deploymentId} as failed`);
        this.printSummary(summary);
        // The Failed status is what was asked for here
        return 0;
    }

    private async handleCheckUpgrade(options: CliOptions): Promise<number> {
        const deploymentId = this.requireOption(options, 'deployment');
        const result = await this.openRollout(options).checkUpgrade(deploymentId);
        this.printUpgradeCheck(result);
        return 0;
    }

    private async handleStatus(options: CliOptions): Promise<number> {
        const rollout = this.openRollout(options);
        const deploymentId = this.stringOption(options, 'deployment');

        if (deploymentId) {
            this.printStatus(await rollout.getStatus(deploymentId));
            return 0;
        }

        const deployments = await rollout.listDeployments(this.stringOption(options, 'environment'));
        if (deployments.length === 0) {
            this.out.log('No product deployments recorded');
            return 0;
        }
        this.out.log(`📊 Product deployments (${deployments.length}):`);
        for (const deployment of deployments) {
            this.out.log(`   ${deployment.id}  ${deployment.productGroupId} ${deployment.productVersion}  ${deployment.environmentId}  ${deployment.status}`);
        }
        return 0;
    }

    private handleValidate(options: CliOptions): number {
        const configPath = this.resolveConfigPath(options);
        this.out.log(`🔍 Validating configuration: ${configPath}`);

        const config = ConfigManager.loadConfig(configPath);
        const products = ConfigManager.loadCatalog(config.catalogPath);
        const resolver = new ComposeManifestResolver();
        let stacks = 0;
        for (const product of products) {
            for (const stack of product.stacks) {
                resolver.parse(stack.manifest);
                stacks++;
            }
        }

        this.out.log('✅ Configuration is valid');
        this.out.log(`   Environments: ${config.environments.map(environment => environment.id).join(', ')}`);
        this.out.log(`   Catalog: ${products.length} product versions, ${stacks} stack manifests`);
        this.out.log(`   State directory: ${config.stateDir}`);
        return 0;
    }

    /**
     * Stream progress to the console and cancel on Ctrl-C
     */
    private async withProgress(
        rollout: StackRollout,
        operation: (signal: AbortSignal) => Promise<ProductOperationSummary>
    ): Promise<ProductOperationSummary> {
        const reporter = new ConsoleProgressReporter(line => this.out.log(line));
        const controller = new AbortController();
        const onInterrupt = (): void => {
            this.out.log('⏹️  Cancelling after the current service...');
            controller.abort();
        };

        reporter.attach(rollout.progress);
        process.once('SIGINT', onInterrupt);
        try {
            return await operation(controller.signal);
        } finally {
            process.removeListener('SIGINT', onInterrupt);
            reporter.detach();
        }
    }

    private printSummary(summary: ProductOperationSummary): number {
        const deployment = summary.deployment;
        this.out.log(`\n📊 ${summary.operation} summary: ${deployment.productName} ${deployment.productVersion}`);
        this.out.log(`   Deployment: ${deployment.id}`);
        this.out.log(`   Status: ${deployment.status}`);
        this.out.log(`   Stacks: ${summary.completedStacks}/${summary.totalStacks} running, ${summary.failedStacks} failed`);
        this.out.log(`   Duration: ${(summary.totalDuration / 1000).toFixed(2)}s`);
        if (summary.retryCount > 0) {
            this.out.log(`   Pull retries: ${summary.retryCount}`);
        }

        for (const result of summary.results) {
            const icon = result.success ? '✅' : '❌';
            const detail = result.error ? `: ${result.error}` : '';
            this.out.log(`   ${icon} ${result.stackName} ${result.status} (${result.startedServices}/${result.totalServices} services)${detail}`);
        }

        if (summary.cancelled) {
            this.out.log('⏹️  Operation was cancelled; completed work was kept');
        }
        if (summary.snapshotRetained) {
            this.out.log(`↩️  Rollback available: stack-rollout rollback --deployment ${deployment.id}`);
        }
        if (summary.requiresManualIntervention) {
            this.out.log('🚨 Manual intervention required');
        }

        return deployment.status === ProductStatus.FAILED ? 1 : 0;
    }

    private printStatus(status: ProductDeploymentStatus): void {
        const deployment = status.deployment;
        this.out.log(`📦 ${deployment.productName} ${deployment.productVersion} (${deployment.id})`);
        this.out.log(`   Environment: ${deployment.environmentId}`);
        this.out.log(`   Status: ${deployment.status}`);
        this.out.log(`   Upgrades: ${deployment.upgradeCount}${deployment.previousVersion ? ` (previous ${deployment.previousVersion})` : ''}`);
        if (status.hasSnapshot) {
            this.out.log(`   Rollback available to ${status.rollbackVersion}`);
        }
        for (const stack of status.stacks) {
            const mode = stack.operationMode === OperationMode.MAINTENANCE ? ' [maintenance]' : '';
            this.out.log(`   - ${stack.deploymentName} ${stack.version} ${stack.status}${mode}${stack.errorMessage ? `: ${stack.errorMessage}` : ''}`);
        }
    }

    private printUpgradeCheck(result: UpgradeCheckResult): void {
        this.out.log(result.upgradeAvailable ? `⬆️  ${result.message}` : `✅ ${result.message}`);
        for (const version of result.availableVersions) {
            this.out.log(`   ${version.version} (${version.stackCount} stacks)`);
        }
        if (result.newStacks.length > 0) {
            this.out.log(`   New stacks: ${result.newStacks.join(', ')}`);
        }
        if (result.removedStacks.length > 0) {
            this.out.log(`   Stacks no longer in ${result.latestVersion}: ${result.removedStacks.join(', ')}`);
        }
    }

    private openRollout(options: CliOptions): StackRollout {
        return this.createRollout(this.resolveConfigPath(options));
    }

    private operationOptions(options: CliOptions, signal: AbortSignal): OperationOptions {
        return { signal, sessionId: this.stringOption(options, 'session') };
    }

    private resolveConfigPath(options: CliOptions): string {
        const configPath = this.stringOption(options, 'config') ?? this.findDefaultConfig();
        if (!configPath || !fs.existsSync(configPath)) {
            throw new Error(`Configuration file not found: ${configPath ?? DEFAULT_CONFIG_PATHS.join(', ')}`);
        }
        return configPath;
    }

    private requireOption(options: CliOptions, key: string): string {
        const value = this.stringOption(options, key);
        if (!value) {
            throw new ValidationError('RolloutCLI', key, key, `--${key} is required`);
        }
        return value;
    }

    private stringOption(options: CliOptions, key: string): string | undefined {
        const value = options[key];
        return typeof value === 'string' ? value : undefined;
    }

    private parseOptions(args: string[]): CliOptions {
        const options: CliOptions = {};

        for (let i = 0; i < args.length; i++) {
            const arg = args[i];

            if (arg.startsWith('--')) {
                const key = arg.slice(2);

                if (VALUE_OPTIONS.includes(key) && i + 1 < args.length) {
                    options[key] = args[i + 1];
                    i++; // Skip next argument
                } else if (FLAG_OPTIONS.includes(key)) {
                    options[key] = true;
                } else {
                    options[key] = true;
                }
            }
        }

        return options;
    }

    private findDefaultConfig(): string | undefined {
        return DEFAULT_CONFIG_PATHS.find(configPath => fs.existsSync(configPath));
    }

    private printHelp(): void {
        this.out.log(`
Stack Rollout CLI - deploy, upgrade and roll back multi-stack products

Usage:
  stack-rollout <command> [options]

Commands:
  deploy          Deploy a product from a request file
  upgrade         Upgrade a product deployment to a newer catalog version
  rollback        Restore the stacks of a failed upgrade from its snapshot
  remove          Stop and remove every stack of a product deployment
  maintenance     Switch a product deployment between normal and maintenance mode
  mark-failed     Mark a product deployment left Deploying or Upgrading as Failed
  check-upgrade   List newer catalog versions of a product deployment
  status          Show one product deployment, or list them all
  validate        Validate the configuration file and catalog
  help            Show this help message

Options:
  --config <path>        Orchestrator configuration (default: ${DEFAULT_CONFIG_PATHS.join(', ')})
  --request <path>       Deploy or upgrade request file
  --deployment <id>      Product deployment id
  --version <version>    Target version for upgrade
  --mode <mode>          normal or maintenance
  --reason <text>        Reason recorded with a mode change or mark-failed
  --environment <id>     Filter for status
  --session <id>         Session id for progress events
  --continue-on-error    Keep deploying later stacks after a stack fails
  --force-refresh        Pull images even when present locally
  --force                Confirm removal

Examples:
  stack-rollout deploy --request requests/deploy-shop.yaml
  stack-rollout upgrade --deployment <id> --version 2.0.0
  stack-rollout rollback --deployment <id>
  stack-rollout maintenance --deployment <id> --mode maintenance --reason "db migration"
  stack-rollout remove --deployment <id> --force
  stack-rollout mark-failed --deployment <id> --reason "host rebooted mid-upgrade"
        `);
    }
}

// Run CLI if this file is executed directly
if (require.main === module) {
    // Load environment variables from .env file if it exists
    if (fs.existsSync('.env')) {
        dotenv.config();
        console.log('🔧 Loaded environment variables from .env file');
    }

    const cli = new RolloutCLI();
    cli.run()
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(toError(error).message);
            process.exitCode = 1;
        });
}
