export * from './agent-events';
export * from './agent-types';
export * from './blackboard';
export * from './capabilities';
export * from './contracts';
export * from './coordinator';
export * from './dangerousPatterns';
export * from './defaultTools';
export * from './humanInLoop';
export * from './memoryLedger';
export * from './parallelStrategy';
export * from './planModel';
export * from './safeExecutor';
export * from './strategyProfile';
export * from './toolErrors';
export * from './toolPerformanceLog';
export * from './toolRegistry';
export { ArithmeticError, evaluateArithmetic } from './arithmetic';
