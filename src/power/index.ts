export { planTest } from './TestPlanner';
export type { TestPlan, TestPlanInput } from './TestPlanner';
export { PowerSimulator } from './PowerSimulator';
export type { SimulationScenario, PowerAnalysisResult } from './PowerSimulator';
