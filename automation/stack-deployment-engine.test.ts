import { StackDeploymentEngine } from './stack-deployment-engine';
import { createStackDeployment } from './product-deployment';
import { ProgressTracker } from './progress-tracker';
import { InMemoryDeploymentRepository } from '../components/persistence';
import { StaticDriverProvider } from '../components/runtime';
import { RecoveryStrategy, ValidationError } from '../components/shared/utils/error-handling';
import { FakeRuntimeDriver, TEST_ENVIRONMENT } from '../tests/test-utils';
import {
    DeploymentPlan,
    OperationMode,
    ProgressEvent,
    ServiceSpec,
    StackDeployment,
    StackStatus
} from './types';

function service(stackName: string, name: string, image: string, extra: Partial<ServiceSpec> = {}): ServiceSpec {
    return {
        name,
        containerName: `${stackName}_${name}`,
        image,
        environment: {},
        ports: [],
        volumes: [],
        networks: [],
        labels: {},
        ...extra
    };
}

const apiPlan: DeploymentPlan = {
    stackName: 'shop-api',
    version: '1.0.0',
    services: [
        service('shop-api', 'api', 'shop/api:1.0', { environment: { PORT: '8080' } }),
        service('shop-api', 'worker', 'shop/worker:1.0')
    ],
    networks: [],
    volumes: []
};

function pendingStack(deploymentName: string = 'shop-api'): StackDeployment {
    return createStackDeployment({
        id: `${deploymentName}-id`,
        environmentId: TEST_ENVIRONMENT,
        productDeploymentId: 'product-1',
        stackId: 'api',
        stackName: 'api',
        deploymentName,
        version: '1.0.0',
        order: 0
    });
}

describe('StackDeploymentEngine', () => {
    let driver: FakeRuntimeDriver;
    let repository: InMemoryDeploymentRepository;
    let engine: StackDeploymentEngine;
    let events: ProgressEvent[];
    let tracker: ProgressTracker;

    beforeEach(() => {
        driver = new FakeRuntimeDriver();
        repository = new InMemoryDeploymentRepository();
        engine = new StackDeploymentEngine(new StaticDriverProvider({ [TEST_ENVIRONMENT]: driver }), repository, {
            pullRecovery: { strategy: RecoveryStrategy.FAIL_FAST }
        });
        events = [];
        tracker = new ProgressTracker({ publish: event => { events.push(event); } }, {
            deploymentId: 'product-1',
            sessionId: 'session-1',
            totalStacks: 1
        }).forStack('shop-api', 0);
    });

    describe('run', () => {
        it('should deploy services in declaration order on the default network', async () => {
            const { stack, result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: { API_TAG: '1.0' }, mode: 'deploy', progress: tracker });

            expect(driver.calls).toEqual([
                'network shop-api_default',
                'pull shop/api:1.0',
                'create shop-api_api',
                'pull shop/worker:1.0',
                'create shop-api_worker'
            ]);
            expect(stack.status).toBe(StackStatus.RUNNING);
            expect(stack.startedServices).toBe(2);
            expect(stack.variables).toEqual({ API_TAG: '1.0' });
            expect(result).toMatchObject({
                success: true,
                status: StackStatus.RUNNING,
                startedServices: 2,
                totalServices: 2,
                pointOfNoReturnCrossed: true,
                cancelled: false
            });
            expect((await repository.getStacks([stack.id]))[0]).toEqual(stack);
        });

        it('should label every container with the stack and service', async () => {
            await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });

            const spec = driver.specOf('shop-api_api');
            expect(spec?.labels).toEqual({
                stack: 'shop-api',
                'stack-rollout.managed': 'true',
                'stack-rollout.service': 'api',
                'stack-rollout.version': '1.0.0'
            });
            expect(spec?.networks).toEqual(['shop-api_default']);
            expect(spec?.environment).toEqual({ PORT: '8080' });
        });

        it('should use local images unless a refresh is forced', async () => {
            driver.images.add('shop/api:1.0');
            driver.images.add('shop/worker:1.0');

            await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });
            expect(driver.callsOf('pull')).toEqual([]);

            await engine.run({ stack: pendingStack('shop-api-2'), plan: { ...apiPlan, stackName: 'shop-api-2' }, variables: {}, mode: 'deploy', progress: tracker, forceRefresh: true });
            expect(driver.callsOf('pull')).toEqual(['shop/api:1.0', 'shop/worker:1.0']);
        });

        it('should fall back to the local image when a forced pull fails', async () => {
            driver.images.add('shop/api:1.0');
            driver.images.add('shop/worker:1.0');
            driver.failPull.add('shop/api:1.0');

            const { result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker, forceRefresh: true });

            expect(result.success).toBe(true);
            expect(driver.callsOf('create')).toEqual(['shop-api_api', 'shop-api_worker']);
        });

        it('should stop at the first failing service and mark the stack Failed', async () => {
            driver.failCreate.add('shop-api_api');

            const { stack, result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });

            expect(driver.callsOf('create')).toEqual(['shop-api_api']);
            expect(driver.callsOf('pull')).toEqual(['shop/api:1.0']);
            expect(stack.status).toBe(StackStatus.FAILED);
            expect(result).toMatchObject({
                success: false,
                startedServices: 0,
                pointOfNoReturnCrossed: false,
                failedService: 'api',
                error: "api: [FakeRuntimeDriver:local] create 'shop-api_api' failed: port is already allocated"
            });
            expect(stack.errorMessage).toBe(result.error);
        });

        it('should report a pull failure without creating the container', async () => {
            driver.failPull.add('shop/worker:1.0');

            const { result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });

            expect(driver.callsOf('create')).toEqual(['shop-api_api']);
            expect(result.startedServices).toBe(1);
            expect(result.pointOfNoReturnCrossed).toBe(true);
            expect(result.error).toBe("worker: [FakeRuntimeDriver:local] pull 'shop/worker:1.0' failed: manifest unknown");
        });

        it('should report each further pull attempt', async () => {
            const retrying = new StackDeploymentEngine(new StaticDriverProvider({ [TEST_ENVIRONMENT]: driver }), repository, {
                pullRecovery: { strategy: RecoveryStrategy.RETRY, maxRetries: 2, retryDelay: 0 }
            });
            const onPullRetry = jest.fn();
            driver.failPull.add('shop/api:1.0');

            const { result } = await retrying.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker, onPullRetry });

            expect(driver.callsOf('pull')).toEqual(['shop/api:1.0', 'shop/api:1.0', 'shop/api:1.0']);
            expect(onPullRetry.mock.calls).toEqual([
                ['shop/api:1.0', 2, 3, 0],
                ['shop/api:1.0', 3, 3, 0]
            ]);
            expect(result.success).toBe(false);
        });

        it('should not retry a pull error that is not retryable', async () => {
            const retrying = new StackDeploymentEngine(new StaticDriverProvider({ [TEST_ENVIRONMENT]: driver }), repository, {
                pullRecovery: { strategy: RecoveryStrategy.RETRY, maxRetries: 2, retryDelay: 0 }
            });
            const onPullRetry = jest.fn();
            const pull = jest.spyOn(driver, 'pullImage')
                .mockRejectedValue(new ValidationError('FakeRuntimeDriver', 'shop/api:1.0', 'image', 'invalid reference format'));

            const { result } = await retrying.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker, onPullRetry });

            expect(pull).toHaveBeenCalledTimes(1);
            expect(onPullRetry).not.toHaveBeenCalled();
            expect(result.error).toBe('api: [FakeRuntimeDriver:shop/api:1.0] invalid reference format');
        });

        it('should replace a container that already has the target name', async () => {
            await driver.createAndStart({ name: 'shop-api_api', image: 'shop/api:0.9', environment: {}, ports: [], volumes: [], networks: [], labels: {} });
            driver.calls.length = 0;

            await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });

            expect(driver.calls.slice(0, 4)).toEqual([
                'network shop-api_default',
                'pull shop/api:1.0',
                'remove shop-api_api',
                'create shop-api_api'
            ]);
            expect(driver.list().map(container => container.image)).toEqual(['shop/api:1.0', 'shop/worker:1.0']);
        });

        it('should stop between services once cancelled', async () => {
            const controller = new AbortController();
            driver.onCreate = spec => {
                if (spec.name === 'shop-api_api') {
                    controller.abort();
                }
            };

            const { stack, result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker, signal: controller.signal });

            expect(driver.callsOf('create')).toEqual(['shop-api_api']);
            expect(result.cancelled).toBe(true);
            expect(result.success).toBe(false);
            expect(stack.status).toBe(StackStatus.FAILED);
            expect(stack.errorMessage).toBe('Cancelled after 1 of 2 services');
        });

        it('should move a running stack through Upgrading and emit upgrade phases', async () => {
            const running: StackDeployment = { ...pendingStack('shop-web'), status: StackStatus.RUNNING };
            const webPlan: DeploymentPlan = {
                stackName: 'shop-web',
                version: '2.0.0',
                services: [service('shop-web', 'web', 'shop/web:2.0')],
                networks: [],
                volumes: []
            };
            driver.images.add('shop/web:2.0');

            const { stack } = await engine.run({ stack: running, plan: webPlan, variables: {}, mode: 'upgrade', progress: tracker });

            expect(stack.status).toBe(StackStatus.RUNNING);
            expect(stack.version).toBe('2.0.0');
            expect(events.map(event => event.phase)).toEqual(['upgrading', 'pulling', 'starting', 'starting', 'completed']);
            expect(events.map(event => event.percentComplete)).toEqual([0, 0, 0, 100, 100]);
            expect(events[2]).toMatchObject({ currentService: 'web', stackName: 'shop-api', stackIndex: 0, totalStacks: 1 });
        });

        it('should stop a maintenance stack again after redeploying it', async () => {
            const inMaintenance: StackDeployment = { ...pendingStack(), status: StackStatus.RUNNING, operationMode: OperationMode.MAINTENANCE };

            const { stack } = await engine.run({ stack: inMaintenance, plan: apiPlan, variables: {}, mode: 'upgrade', progress: tracker });

            expect(stack.operationMode).toBe(OperationMode.MAINTENANCE);
            expect(driver.callsOf('stop')).toEqual(['shop-api_api', 'shop-api_worker']);
        });

        it('should keep going when the progress sink throws', async () => {
            const failing = new ProgressTracker({ publish: () => { throw new Error('socket closed'); } }, {
                deploymentId: 'product-1',
                sessionId: 'session-1',
                totalStacks: 1
            });

            const { result } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: failing });

            expect(result.success).toBe(true);
        });
    });

    describe('remove', () => {
        it('should remove every labelled container and end Removed despite failures', async () => {
            const { stack } = await engine.run({ stack: pendingStack(), plan: apiPlan, variables: {}, mode: 'deploy', progress: tracker });
            driver.failRemove.add('shop-api_worker');
            driver.calls.length = 0;

            const { stack: removed, result } = await engine.remove(stack, tracker);

            expect(driver.calls).toEqual([
                'stop shop-api_api',
                'remove shop-api_api',
                'stop shop-api_worker',
                'remove shop-api_worker'
            ]);
            expect(removed.status).toBe(StackStatus.REMOVED);
            expect(result.success).toBe(false);
            expect(result.affectedContainers).toBe(1);
            expect(removed.errorMessage).toBe("shop-api_worker: [FakeRuntimeDriver:local] remove 'shop-api_worker' failed: device busy");
        });

        it('should remove a stack that never deployed', async () => {
            const { stack, result } = await engine.remove(pendingStack(), tracker);

            expect(stack.status).toBe(StackStatus.REMOVED);
            expect(result.success).toBe(true);
            expect(result.affectedContainers).toBe(0);
        });
    });

    describe('setOperationMode', () => {
        it('should stop containers for maintenance and skip ignored ones', async () => {
            const plan: DeploymentPlan = {
                ...apiPlan,
                services: [apiPlan.services[0], service('shop-api', 'worker', 'shop/worker:1.0', { labels: { maintenance: 'ignore' } })]
            };
            const { stack } = await engine.run({ stack: pendingStack(), plan, variables: {}, mode: 'deploy', progress: tracker });

            const { stack: paused, result } = await engine.setOperationMode(stack, OperationMode.MAINTENANCE);

            expect(driver.callsOf('stop')).toEqual(['shop-api_api']);
            expect(paused.operationMode).toBe(OperationMode.MAINTENANCE);
            expect(result.affectedContainers).toBe(1);

            const { stack: resumed } = await engine.setOperationMode(paused, OperationMode.NORMAL);
            expect(driver.callsOf('start')).toEqual(['shop-api_api']);
            expect(resumed.operationMode).toBe(OperationMode.NORMAL);
        });

        it('should leave the mode unchanged when the driver fails', async () => {
            const running: StackDeployment = { ...pendingStack(), status: StackStatus.RUNNING };
            jest.spyOn(driver, 'stopStackContainers').mockRejectedValue(new Error('engine unavailable'));

            const { stack, result } = await engine.setOperationMode(running, OperationMode.MAINTENANCE);

            expect(stack.operationMode).toBe(OperationMode.NORMAL);
            expect(result.success).toBe(false);
            expect(result.error).toBe('engine unavailable');
        });
    });
});
