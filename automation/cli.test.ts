import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RolloutCLI } from './cli';
import { ProductStatus } from './types';
import { TestHarness, createHarness } from '../tests/test-utils';

describe('RolloutCLI', () => {
    let workDir: string;
    let configPath: string;
    let harness: TestHarness;
    let lines: string[];
    let errors: string[];
    let createRollout: jest.Mock;
    let cli: RolloutCLI;

    function writeFile(name: string, content: string): string {
        const filePath = path.join(workDir, name);
        fs.writeFileSync(filePath, content);
        return filePath;
    }

    function deployRequest(): string {
        return writeFile('deploy.yaml', [
            'productId: shop:1.0.0',
            'environmentId: local',
            'stackConfigs:',
            '  - stackId: db',
            '    deploymentStackName: shop-db',
            '  - stackId: api',
            '    deploymentStackName: shop-api',
            '  - stackId: web',
            '    deploymentStackName: shop-web',
            ''
        ].join('\n'));
    }

    async function deployShop(): Promise<string> {
        const summary = await harness.rollout.deploy({
            productId: 'shop:1.0.0',
            environmentId: 'local',
            stackConfigs: [
                { stackId: 'db', deploymentStackName: 'shop-db' },
                { stackId: 'api', deploymentStackName: 'shop-api' },
                { stackId: 'web', deploymentStackName: 'shop-web' }
            ]
        });
        return summary.deployment.id;
    }

    beforeEach(() => {
        jest.clearAllMocks();
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stack-rollout-cli-'));
        configPath = writeFile('stack-rollout.yaml', 'catalogPath: catalog.yaml\nenvironments:\n  - id: local\n');
        harness = createHarness();
        lines = [];
        errors = [];
        createRollout = jest.fn(() => harness.rollout);
        cli = new RolloutCLI(createRollout, {
            log: message => lines.push(message),
            error: message => errors.push(message)
        });
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('should print help without arguments', async () => {
        expect(await cli.run([])).toBe(0);
        expect(lines[0]).toContain('Stack Rollout CLI');
    });

    it('should reject an unknown command', async () => {
        expect(await cli.run(['frobnicate'])).toBe(1);
        expect(errors).toEqual(['Unknown command: frobnicate']);
    });

    it('should deploy from a request file', async () => {
        const code = await cli.run(['deploy', '--config', configPath, '--request', deployRequest()]);

        expect(code).toBe(0);
        expect(createRollout).toHaveBeenCalledWith(configPath);
        expect(lines[0]).toBe('🚀 Deploying shop:1.0.0 to local');
        expect(lines).toContain('   Status: Running');
        expect(lines).toContain('   Stacks: 3/3 running, 0 failed');
        expect((await harness.rollout.listDeployments()).map(deployment => deployment.status)).toEqual([ProductStatus.RUNNING]);
    });

    it('should exit with 1 when the product ends Failed', async () => {
        harness.driver.failPull.add('postgres:15');

        const code = await cli.run(['deploy', '--config', configPath, '--request', deployRequest()]);

        expect(code).toBe(1);
        expect(lines).toContain('   Status: Failed');
    });

    it('should report a missing required option', async () => {
        expect(await cli.run(['deploy', '--config', configPath])).toBe(1);
        expect(errors).toEqual(['❌ Command failed: [RolloutCLI:request] --request is required']);
    });

    it('should report a missing configuration file', async () => {
        const missing = path.join(workDir, 'missing.yaml');

        expect(await cli.run(['status', '--config', missing])).toBe(1);
        expect(errors).toEqual([`❌ Command failed: Configuration file not found: ${missing}`]);
    });

    it('should upgrade to the version given on the command line', async () => {
        const id = await deployShop();

        const code = await cli.run(['upgrade', '--config', configPath, '--deployment', id, '--version', '2.0.0']);

        expect(code).toBe(0);
        expect((await harness.rollout.getStatus(id)).deployment.productVersion).toBe('2.0.0');
    });

    it('should point at rollback when an upgrade keeps its snapshot', async () => {
        const id = await deployShop();
        harness.driver.failPull.add('shop/web:2.0');

        const code = await cli.run(['upgrade', '--config', configPath, '--deployment', id, '--version', '2.0.0']);

        expect(code).toBe(1);
        expect(lines).toContain(`↩️  Rollback available: stack-rollout rollback --deployment ${id}`);

        expect(await cli.run(['rollback', '--config', configPath, '--deployment', id])).toBe(0);
        expect((await harness.rollout.getStatus(id)).deployment.productVersion).toBe('1.0.0');
    });

    it('should ask for --force before removing', async () => {
        const id = await deployShop();

        expect(await cli.run(['remove', '--config', configPath, '--deployment', id])).toBe(0);
        expect(lines).toEqual([
            '⚠️  This will stop and remove every container of the product deployment.',
            'Use --force to confirm removal.'
        ]);
        expect(createRollout).not.toHaveBeenCalled();

        expect(await cli.run(['remove', '--config', configPath, '--deployment', id, '--force'])).toBe(0);
        expect((await harness.rollout.getStatus(id)).deployment.status).toBe(ProductStatus.REMOVED);
    });

    it('should reject an unknown operation mode', async () => {
        const id = await deployShop();

        expect(await cli.run(['maintenance', '--config', configPath, '--deployment', id, '--mode', 'paused'])).toBe(1);
        expect(errors[0]).toBe("❌ Command failed: [RolloutCLI:maintenance] Invalid mode 'paused': expected one of normal, maintenance");
    });

    it('should switch a deployment to maintenance mode', async () => {
        const id = await deployShop();

        expect(await cli.run(['maintenance', '--config', configPath, '--deployment', id, '--mode', 'Maintenance'])).toBe(0);
        expect(lines[0]).toBe(`🛠️  Operation mode of ${id} set to Maintenance`);
    });

    it('should mark an interrupted upgrade as failed with the given reason', async () => {
        const id = await deployShop();
        const status = await harness.rollout.getStatus(id);
        await harness.repository.commit({ product: { ...status.deployment, status: ProductStatus.UPGRADING } });

        const code = await cli.run(['mark-failed', '--config', configPath, '--deployment', id, '--reason', 'host rebooted']);

        expect(code).toBe(0);
        expect(lines[0]).toBe(`🛑 Marked ${id} as failed`);
        expect(lines).toContain('   Status: Failed');
        expect((await harness.rollout.getStatus(id)).deployment.errorMessage).toBe('host rebooted');
    });

    it('should refuse to mark a running deployment as failed', async () => {
        const id = await deployShop();

        expect(await cli.run(['mark-failed', '--config', configPath, '--deployment', id])).toBe(1);
        expect(errors).toEqual([
            `❌ Command failed: [ProductDeploymentOrchestrator:${id}] Only a Deploying or Upgrading product can be marked failed (current: Running)`
        ]);
    });

    it('should list deployments or say there are none', async () => {
        expect(await cli.run(['status', '--config', configPath])).toBe(0);
        expect(lines).toEqual(['No product deployments recorded']);

        const id = await deployShop();
        lines.length = 0;
        expect(await cli.run(['status', '--config', configPath])).toBe(0);
        expect(lines).toEqual([
            '📊 Product deployments (1):',
            `   ${id}  shop 1.0.0  local  Running`
        ]);
    });

    it('should show upgrade availability', async () => {
        const id = await deployShop();

        expect(await cli.run(['check-upgrade', '--config', configPath, '--deployment', id])).toBe(0);
        expect(lines).toEqual([
            '⬆️  Upgrade available: 1.0.0 -> 3.0.0',
            '   2.0.0 (4 stacks)',
            '   3.0.0 (3 stacks)',
            '   New stacks: search',
            '   Stacks no longer in 3.0.0: web'
        ]);
    });

    it('should validate the configuration and every catalog manifest', async () => {
        writeFile('catalog.yaml', [
            'products:',
            '  - groupId: shop',
            '    version: 1.0.0',
            '    stacks:',
            '      - id: web',
            '        manifest:',
            '          services:',
            '            web:',
            '              image: shop/web:1.0',
            ''
        ].join('\n'));

        expect(await cli.run(['validate', '--config', configPath])).toBe(0);
        expect(lines).toEqual([
            `🔍 Validating configuration: ${configPath}`,
            '✅ Configuration is valid',
            '   Environments: local',
            '   Catalog: 1 product versions, 1 stack manifests',
            `   State directory: ${path.join(workDir, '.stack-rollout')}`
        ]);
    });
});
