import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for interpreter components.
 *
 * Modules are created once during bootstrap and live for the whole run. They
 * receive their collaborators through dependency injection so the same module
 * can be driven by the real entry point (stdin, MongoDB, pino) or by a test
 * (in-memory streams, in-memory store, mock logger).
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - Store injected dependencies and create service instances
 * - Must not start consuming input
 * - Failures abort startup
 *
 * ### Phase 2: run()
 * - Activate the module (for the interpreter: consume the input stream)
 * - All injected dependencies are ready to use
 *
 * ## Bootstrap Pattern
 *
 * ```typescript
 * const interpreter = new InterpreterModule();
 *
 * await interpreter.init({ store, logger, input: process.stdin, output: process.stdout });
 * await interpreter.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata used for logging contexts.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * @param dependencies - Typed dependencies object specific to this module
     * @throws {Error} If initialization fails (aborts startup)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Run the module after initialization.
     *
     * @throws {Error} If called before init()
     */
    run(): Promise<void>;
}
