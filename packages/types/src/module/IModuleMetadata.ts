/**
 * Module metadata for introspection and log attribution.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module.
     *
     * Lowercase kebab-case matching the module directory name. Bound into the
     * module's child logger.
     *
     * @example 'interpreter'
     */
    id: string;

    /**
     * Human-readable module name.
     */
    name: string;

    /**
     * Semantic version string.
     */
    version: string;

    description?: string;
}
