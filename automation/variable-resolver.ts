import { VariableDefinition } from './types';

type Layer = Readonly<Record<string, string>> | undefined;

/**
 * Layered variable resolution. Later layers win; a name missing from a layer
 * leaves the lower layer's value in place.
 */
export class VariableResolver {
    /**
     * Resolve variables for a fresh deployment:
     * stack defaults < shared variables < per-stack overrides
     */
    public static resolve(
        definitions: readonly VariableDefinition[],
        sharedVariables?: Layer,
        stackOverrides?: Layer
    ): Record<string, string> {
        return this.merge(this.defaults(definitions), sharedVariables, stackOverrides);
    }

    /**
     * Resolve variables for an upgrade:
     * stack defaults < values of the existing deployment < shared variables < per-stack overrides
     */
    public static resolveForUpgrade(
        definitions: readonly VariableDefinition[],
        existingValues?: Layer,
        sharedVariables?: Layer,
        stackOverrides?: Layer
    ): Record<string, string> {
        return this.merge(this.defaults(definitions), existingValues, sharedVariables, stackOverrides);
    }

    /**
     * Defaults declared by a stack definition. Empty defaults are not values.
     */
    public static defaults(definitions: readonly VariableDefinition[]): Record<string, string> {
        const values: Record<string, string> = {};
        for (const definition of definitions) {
            if (definition.defaultValue !== undefined && definition.defaultValue !== '') {
                values[definition.name] = definition.defaultValue;
            }
        }
        return values;
    }

    private static merge(...layers: Layer[]): Record<string, string> {
        const result: Record<string, string> = {};
        for (const layer of layers) {
            if (!layer) {
                continue;
            }
            for (const [name, value] of Object.entries(layer)) {
                result[name] = value;
            }
        }
        return result;
    }
}
