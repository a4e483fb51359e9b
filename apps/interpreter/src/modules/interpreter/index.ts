export { InterpreterModule } from './InterpreterModule.js';
export type { IInterpreterModuleDependencies, IInterpreterRunSummary, LineOutcome } from './InterpreterModule.js';
