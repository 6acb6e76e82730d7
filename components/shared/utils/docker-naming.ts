/**
 * Naming rules for containers, networks and labels created by the runtime driver.
 */

export const STACK_LABEL = 'stack';
export const MANAGED_LABEL = 'stack-rollout.managed';
export const SERVICE_LABEL = 'stack-rollout.service';
export const VERSION_LABEL = 'stack-rollout.version';
export const MAINTENANCE_LABEL = 'maintenance';
export const MAINTENANCE_IGNORE = 'ignore';

/**
 * Make a deployment name safe for container and network names.
 */
export function sanitizeName(name: string): string {
    const sanitized = name
        .replace(/[^a-zA-Z0-9_.-]/g, '_')
        .replace(/^[^a-zA-Z0-9]+/, '')
        .replace(/_+/g, '_')
        .replace(/_$/, '');

    return sanitized.length > 0 ? sanitized : 'unnamed';
}

export function containerName(stackName: string, serviceName: string): string {
    return `${sanitizeName(stackName)}_${serviceName}`;
}

export function networkName(stackName: string, network: string): string {
    return `${sanitizeName(stackName)}_${network}`;
}

export function defaultNetworkName(stackName: string): string {
    return networkName(stackName, 'default');
}

/**
 * Labels applied to every container at create time. The `stack` label is how
 * a stack's containers are found again later.
 */
export function containerLabels(stackName: string, serviceName: string, version: string): Record<string, string> {
    return {
        [STACK_LABEL]: sanitizeName(stackName),
        [MANAGED_LABEL]: 'true',
        [SERVICE_LABEL]: serviceName,
        [VERSION_LABEL]: version
    };
}
