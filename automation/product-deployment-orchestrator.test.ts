import { OperationLockManager } from './operation-lock';
import { OperationMode, ProductStatus, StackStatus } from './types';
import { captureSnapshot } from './upgrade-coordinator';
import {
    ConcurrencyConflictError,
    RecoveryStrategy,
    RolloutError,
    ValidationError
} from '../components/shared/utils/error-handling';
import {
    TestHarness,
    createHarness,
    productDefinition,
    shopDeployRequest,
    stackDefinition
} from '../tests/test-utils';

describe('ProductDeploymentOrchestrator', () => {
    let harness: TestHarness;

    beforeEach(() => {
        jest.clearAllMocks();
        harness = createHarness();
    });

    describe('deploy', () => {
        it('should deploy every stack in declaration order', async () => {
            const summary = await harness.rollout.deploy(shopDeployRequest());

            expect(harness.driver.callsOf('create')).toEqual(['shop-db_db', 'shop-api_api', 'shop-api_worker', 'shop-web_web']);
            expect(summary.deployment.status).toBe(ProductStatus.RUNNING);
            expect(summary.stacks.map(stack => [stack.deploymentName, stack.status, stack.order])).toEqual([
                ['shop-db', StackStatus.RUNNING, 0],
                ['shop-api', StackStatus.RUNNING, 1],
                ['shop-web', StackStatus.RUNNING, 2]
            ]);
            expect(summary).toMatchObject({ operation: 'deploy', totalStacks: 3, completedStacks: 3, failedStacks: 0, hasErrors: false, cancelled: false });
            expect(summary.deployment.phaseHistory.map(phase => phase.phase)).toEqual([ProductStatus.DEPLOYING, ProductStatus.RUNNING]);
            expect(summary.deployment.sessionId).toMatch(/^product-shop-\d+$/);
        });

        it('should keep catalog order whatever order the request lists stacks in', async () => {
            const request = shopDeployRequest();
            await harness.rollout.deploy({ ...request, stackConfigs: [...request.stackConfigs].reverse() });

            expect(harness.driver.callsOf('create')).toEqual(['shop-db_db', 'shop-api_api', 'shop-api_worker', 'shop-web_web']);
        });

        it('should deploy only the requested stacks', async () => {
            const summary = await harness.rollout.deploy(shopDeployRequest({
                stackConfigs: [
                    { stackId: 'db', deploymentStackName: 'shop-db' },
                    { stackId: 'web', deploymentStackName: 'shop-web' }
                ]
            }));

            expect(summary.stacks.map(stack => stack.stackId)).toEqual(['db', 'web']);
            expect(summary.deployment.totalStacks).toBe(2);
        });

        it('should resolve defaults, shared variables and per-stack overrides', async () => {
            const request = shopDeployRequest({ sharedVariables: { API_TAG: '1.1', DB_TAG: '15.4' } });
            await harness.rollout.deploy({
                ...request,
                stackConfigs: request.stackConfigs.map(config =>
                    config.stackId === 'db' ? { ...config, variables: { DB_TAG: '14' } } : config)
            });

            expect(harness.driver.callsOf('pull')).toEqual(['postgres:14', 'shop/api:1.1', 'shop/worker:1.1', 'shop/web:1.0']);
            const [product] = await harness.rollout.listDeployments();
            expect(product.sharedVariables).toEqual({ API_TAG: '1.1', DB_TAG: '15.4' });
        });

        it('should carry on past a failed stack with continue-on-error', async () => {
            harness.driver.failCreate.add('shop-api_api');

            const summary = await harness.rollout.deploy(shopDeployRequest({ continueOnError: true }));

            expect(summary.stacks.map(stack => stack.status)).toEqual([StackStatus.RUNNING, StackStatus.FAILED, StackStatus.RUNNING]);
            expect(summary.deployment.status).toBe(ProductStatus.PARTIALLY_RUNNING);
            expect(summary.deployment.completedStacks).toBe(2);
            expect(summary.deployment.failedStacks).toBe(1);
            expect(summary.deployment.errorMessage).toBe('2/3 stacks running; failed: shop-api');
            expect(summary.hasErrors).toBe(true);
        });

        it('should leave later stacks Pending when continue-on-error is off', async () => {
            const run = jest.spyOn(harness.rollout.orchestrator.engine, 'run');
            harness.driver.failCreate.add('shop-api_worker');

            const summary = await harness.rollout.deploy(shopDeployRequest());

            expect(run).toHaveBeenCalledTimes(2);
            expect(summary.stacks.map(stack => stack.status)).toEqual([StackStatus.RUNNING, StackStatus.FAILED, StackStatus.PENDING]);
            expect(summary.results).toHaveLength(2);
            expect(summary.deployment.status).toBe(ProductStatus.PARTIALLY_RUNNING);
            expect(harness.driver.callsOf('create')).not.toContain('shop-web_web');
        });

        it('should end Failed when the first stack fails and nothing else runs', async () => {
            harness.driver.failPull.add('postgres:15');

            const summary = await harness.rollout.deploy(shopDeployRequest());

            expect(summary.deployment.status).toBe(ProductStatus.FAILED);
            expect(summary.deployment.errorMessage).toBe('0/3 stacks running; failed: shop-db');
            expect(harness.driver.callsOf('create')).toEqual([]);
        });

        it('should publish product and stack progress in one session', async () => {
            const summary = await harness.rollout.deploy(shopDeployRequest({ sessionId: 'session-42' }));

            expect(summary.deployment.sessionId).toBe('session-42');
            expect(harness.events.every(event => event.sessionId === 'session-42')).toBe(true);
            expect(harness.events[0]).toMatchObject({ phase: 'deploying', message: 'Deploying shop 1.0.0 (3 stacks)', percentComplete: 0 });
            expect(harness.events[1]).toMatchObject({ phase: 'deploying', message: 'Stack 1/3: shop-db', stackName: 'shop-db', stackIndex: 0, totalStacks: 3 });
            expect(harness.events[harness.events.length - 1]).toMatchObject({ phase: 'completed', message: 'All 3 stacks running', percentComplete: 100 });
            expect(harness.events.filter(event => event.phase === 'starting' && event.currentService === 'worker')).toHaveLength(2);
        });

        it('should stop before the next stack once cancelled', async () => {
            const controller = new AbortController();
            harness.driver.onCreate = spec => {
                if (spec.name === 'shop-db_db') {
                    controller.abort();
                }
            };

            const summary = await harness.rollout.deploy(shopDeployRequest(), { signal: controller.signal });

            expect(summary.cancelled).toBe(true);
            expect(summary.stacks.map(stack => stack.status)).toEqual([StackStatus.RUNNING, StackStatus.PENDING, StackStatus.PENDING]);
            expect(summary.deployment.status).toBe(ProductStatus.PARTIALLY_RUNNING);
            expect(summary.deployment.errorMessage).toBe('1/3 stacks running (cancelled)');
        });

        it('should count pull retries in the summary', async () => {
            harness = createHarness({ pullRecovery: { strategy: RecoveryStrategy.RETRY, maxRetries: 1, retryDelay: 0 } });
            harness.driver.failPull.add('shop/web:1.0');

            const summary = await harness.rollout.deploy(shopDeployRequest());

            expect(harness.driver.callsOf('pull')).toEqual(['postgres:15', 'shop/api:1.0', 'shop/worker:1.0', 'shop/web:1.0', 'shop/web:1.0']);
            expect(summary.retryCount).toBe(1);
            expect(summary.failedStacks).toBe(1);
        });

        it('should mark the product Failed and rethrow when orchestration breaks', async () => {
            jest.spyOn(harness.rollout.orchestrator.engine, 'run').mockRejectedValueOnce(new Error('disk full'));

            await expect(harness.rollout.deploy(shopDeployRequest()))
                .rejects.toThrow("[ProductDeploymentOrchestrator:shop] Operation 'deploy' failed: disk full");

            const [product] = await harness.rollout.listDeployments();
            expect(product.status).toBe(ProductStatus.FAILED);
            expect(product.errorMessage).toBe('disk full');
        });
    });

    describe('deploy validation', () => {
        it('should reject an unknown product without writing anything', async () => {
            await expect(harness.rollout.deploy(shopDeployRequest({ productId: 'shop:9.9.9' })))
                .rejects.toThrow("Unknown product 'shop:9.9.9'");
            expect(await harness.rollout.listDeployments()).toEqual([]);
        });

        it('should reject a stack that is not part of the product', async () => {
            await expect(harness.rollout.deploy(shopDeployRequest({
                stackConfigs: [{ stackId: 'cache', deploymentStackName: 'shop-cache' }]
            }))).rejects.toThrow("Stack 'cache' is not part of product 'shop:1.0.0'");
            expect(await harness.rollout.listDeployments()).toEqual([]);
        });

        it('should reject an empty stack list', async () => {
            await expect(harness.rollout.deploy(shopDeployRequest({ stackConfigs: [] })))
                .rejects.toThrow('stackConfigs must not be empty');
        });

        it('should reject deployment names that collide once sanitized', async () => {
            await expect(harness.rollout.deploy(shopDeployRequest({
                stackConfigs: [
                    { stackId: 'db', deploymentStackName: 'shop db' },
                    { stackId: 'api', deploymentStackName: 'shop_db' }
                ]
            }))).rejects.toThrow("Deployment name 'shop_db' is used twice");
        });

        it('should reject an unknown environment', async () => {
            await expect(harness.rollout.deploy(shopDeployRequest({ environmentId: 'staging' })))
                .rejects.toThrow("Unknown environment 'staging'");
        });

        it('should reject a deployment name another product already uses', async () => {
            harness.catalog.add(productDefinition('blog', '1.0.0', [stackDefinition('db', { db: 'mysql:8' })]));
            await harness.rollout.deploy(shopDeployRequest());

            await expect(harness.rollout.deploy({
                productId: 'blog:1.0.0',
                environmentId: 'local',
                stackConfigs: [{ stackId: 'db', deploymentStackName: 'shop-db' }]
            })).rejects.toThrow("Deployment name 'shop-db' is already in use in environment 'local'");
        });

        it('should reject a manifest that cannot be resolved before creating records', async () => {
            harness.catalog.add(productDefinition('broken', '1.0.0', [{ id: 'app', name: 'app', variables: [], manifest: 'services: {}' }]));

            await expect(harness.rollout.deploy({
                productId: 'broken:1.0.0',
                environmentId: 'local',
                stackConfigs: [{ stackId: 'app', deploymentStackName: 'broken-app' }]
            })).rejects.toBeInstanceOf(ValidationError);
            expect(await harness.rollout.listDeployments()).toEqual([]);
        });

        it('should reject a deploy while another operation holds the product group', async () => {
            harness.rollout.orchestrator.locks.acquire([OperationLockManager.groupKey('local', 'shop')], 'remove');

            await expect(harness.rollout.deploy(shopDeployRequest())).rejects.toBeInstanceOf(ConcurrencyConflictError);
        });
    });

    describe('remove', () => {
        it('should remove stacks in reverse order and end Removed', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            harness.driver.calls.length = 0;

            const summary = await harness.rollout.remove(deployed.deployment.id);

            expect(harness.driver.callsOf('remove')).toEqual(['shop-web_web', 'shop-api_api', 'shop-api_worker', 'shop-db_db']);
            expect(summary.deployment.status).toBe(ProductStatus.REMOVED);
            expect(summary.stacks.every(stack => stack.status === StackStatus.REMOVED)).toBe(true);
            expect(summary.deployment.removedStacks).toBe(3);
            expect(summary.deployment.totalStacks).toBe(0);
            expect(harness.driver.list()).toEqual([]);
        });

        it('should finish the removal when a container cannot be removed', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            harness.driver.failRemove.add('shop-api_worker');

            const summary = await harness.rollout.remove(deployed.deployment.id);

            expect(summary.deployment.status).toBe(ProductStatus.REMOVED);
            expect(summary.deployment.errorMessage).toBe('shop-api');
            expect(summary.hasErrors).toBe(true);
        });

        it('should allow a fresh deployment of the group once removed', async () => {
            const first = await harness.rollout.deploy(shopDeployRequest());
            await harness.rollout.remove(first.deployment.id);

            const second = await harness.rollout.deploy(shopDeployRequest());

            expect(second.deployment.id).not.toBe(first.deployment.id);
            expect(second.deployment.status).toBe(ProductStatus.RUNNING);
        });

        it('should drop a retained snapshot once the product is removed', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            const id = deployed.deployment.id;
            harness.driver.failPull.add('shop/web:2.0');
            await harness.rollout.upgrade(id, { targetVersion: '2.0.0' });
            expect((await harness.rollout.getStatus(id)).hasSnapshot).toBe(true);

            await harness.rollout.remove(id);

            const status = await harness.rollout.getStatus(id);
            expect(status.deployment.status).toBe(ProductStatus.REMOVED);
            expect(status.hasSnapshot).toBe(false);
            expect(status.rollbackVersion).toBeUndefined();
            await expect(harness.rollout.rollback(id)).rejects.toThrow('no snapshot is stored for this deployment');
        });

        it('should reject removing a removed product', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            await harness.rollout.remove(deployed.deployment.id);

            await expect(harness.rollout.remove(deployed.deployment.id)).rejects.toThrow('Product deployment is already removed');
        });

        it('should reject an unknown deployment id', async () => {
            await expect(harness.rollout.remove('missing')).rejects.toThrow("Unknown product deployment 'missing'");
        });
    });

    describe('changeOperationMode', () => {
        it('should stop the running stacks and record the reason', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());

            const summary = await harness.rollout.changeOperationMode(deployed.deployment.id, OperationMode.MAINTENANCE, 'db migration');

            expect(harness.driver.callsOf('stop')).toEqual(['shop-db_db', 'shop-api_api', 'shop-api_worker', 'shop-web_web']);
            expect(summary.stacks.every(stack => stack.operationMode === OperationMode.MAINTENANCE)).toBe(true);
            expect(summary.deployment.status).toBe(ProductStatus.RUNNING);
            const last = summary.deployment.phaseHistory[summary.deployment.phaseHistory.length - 1];
            expect(last).toMatchObject({ phase: 'OperationMode', message: 'Operation mode changed to Maintenance: db migration' });
        });

        it('should reject switching to the mode already in effect', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());

            await expect(harness.rollout.changeOperationMode(deployed.deployment.id, OperationMode.NORMAL))
                .rejects.toThrow('All running stacks are already in Normal mode');
        });

        it('should reject a product that is not running', async () => {
            harness.driver.failPull.add('postgres:15');
            const deployed = await harness.rollout.deploy(shopDeployRequest());

            await expect(harness.rollout.changeOperationMode(deployed.deployment.id, OperationMode.MAINTENANCE))
                .rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('markFailed', () => {
        it('should fail a product stuck Deploying along with its in-flight stacks', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            const [db, api, web] = deployed.stacks;
            await harness.repository.commit({
                product: { ...deployed.deployment, status: ProductStatus.DEPLOYING },
                stacks: [{ ...web, status: StackStatus.DEPLOYING }]
            });

            harness.driver.calls.length = 0;

            const summary = await harness.rollout.markFailed(deployed.deployment.id);

            expect(summary.operation).toBe('mark-failed');
            expect(summary.deployment).toMatchObject({
                status: ProductStatus.FAILED,
                errorMessage: 'Manually marked as failed',
                completedStacks: 2,
                failedStacks: 1
            });
            expect(summary.deployment.phaseHistory[summary.deployment.phaseHistory.length - 1].message)
                .toBe('Marked failed (was Deploying): Manually marked as failed');
            expect(summary.stacks.map(stack => [stack.id, stack.status])).toEqual([
                [db.id, StackStatus.RUNNING],
                [api.id, StackStatus.RUNNING],
                [web.id, StackStatus.FAILED]
            ]);
            expect(harness.driver.calls).toEqual([]);
        });

        it('should keep the snapshot of an interrupted upgrade so it can be rolled back', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());
            const id = deployed.deployment.id;
            await harness.repository.commit({
                product: { ...deployed.deployment, status: ProductStatus.UPGRADING },
                snapshot: captureSnapshot(deployed.deployment, deployed.stacks)
            });

            const summary = await harness.rollout.markFailed(id, 'upgrade host rebooted');

            expect(summary.deployment.errorMessage).toBe('upgrade host rebooted');
            expect((await harness.rollout.getStatus(id)).rollbackVersion).toBe('1.0.0');

            const restored = await harness.rollout.rollback(id);
            expect(restored.deployment.status).toBe(ProductStatus.RUNNING);
            expect(restored.deployment.productVersion).toBe('1.0.0');
        });

        it('should reject a product that is not Deploying or Upgrading', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());

            await expect(harness.rollout.markFailed(deployed.deployment.id))
                .rejects.toThrow('Only a Deploying or Upgrading product can be marked failed (current: Running)');
            expect((await harness.rollout.getStatus(deployed.deployment.id)).deployment.status).toBe(ProductStatus.RUNNING);
        });
    });

    describe('status queries', () => {
        it('should report stacks and snapshot presence', async () => {
            const deployed = await harness.rollout.deploy(shopDeployRequest());

            const status = await harness.rollout.getStatus(deployed.deployment.id);

            expect(status.deployment.id).toBe(deployed.deployment.id);
            expect(status.stacks).toHaveLength(3);
            expect(status.hasSnapshot).toBe(false);
            expect(status.rollbackVersion).toBeUndefined();
        });

        it('should filter deployments by environment', async () => {
            await harness.rollout.deploy(shopDeployRequest());

            expect(await harness.rollout.listDeployments('local')).toHaveLength(1);
            expect(await harness.rollout.listDeployments('staging')).toEqual([]);
        });

        it('should raise RolloutError subclasses for every rejection', async () => {
            await expect(harness.rollout.getStatus('missing')).rejects.toBeInstanceOf(RolloutError);
        });
    });
});
