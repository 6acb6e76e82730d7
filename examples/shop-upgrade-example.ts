import * as path from 'path';
import { StackRollout } from '../index';
import { ConfigManager } from '../automation/config-manager';
import { formatProgressEvent } from '../components/progress';
import { DeploymentLogger } from '../components/shared/utils/logging';
import { toError } from '../components/shared/utils/error-handling';

/**
 * Deploys shop 1.0.0 to the local Docker engine, upgrades it to the latest
 * catalog version and rolls back if the upgrade stops before its commit point.
 */

const logger = new DeploymentLogger('shop-upgrade-example');

async function main(): Promise<void> {
    const rollout = StackRollout.fromConfig(path.join(__dirname, 'stack-rollout.yaml'));
    const unsubscribe = rollout.onProgress(event => console.log(formatProgressEvent(event)));

    try {
        const deployed = await rollout.deploy(ConfigManager.loadDeployRequest(path.join(__dirname, 'requests', 'deploy-shop.yaml')));
        const id = deployed.deployment.id;
        logger.info(`Deployed ${deployed.deployment.productName} ${deployed.deployment.productVersion} as ${id}`);

        const check = await rollout.checkUpgrade(id);
        if (!check.upgradeAvailable || !check.latestVersion) {
            logger.info(check.message);
            return;
        }

        const request = ConfigManager.loadUpgradeRequest(path.join(__dirname, 'requests', 'upgrade-shop.yaml'));
        const upgraded = await rollout.upgrade(id, { ...request, targetVersion: check.latestVersion });

        if (upgraded.snapshotRetained) {
            logger.warn(`Upgrade left ${id} ${upgraded.deployment.status}, rolling back`);
            const restored = await rollout.rollback(id);
            logger.info(`Rollback finished with status ${restored.deployment.status}`);
        } else {
            logger.info(`Upgrade finished with status ${upgraded.deployment.status}`);
        }
    } finally {
        unsubscribe();
    }
}

main().catch((error: unknown) => {
    logger.error('Example failed', toError(error));
    process.exitCode = 1;
});
