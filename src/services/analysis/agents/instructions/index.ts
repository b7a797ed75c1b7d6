export { ANSWER_LAYOUT_INSTRUCTIONS, BASE_AGENT_INSTRUCTIONS } from './common-instructions';
export { PERFORMANCE_INSTRUCTIONS } from './performance';
export { INFRASTRUCTURE_INSTRUCTIONS } from './infrastructure';
export { SECURITY_INSTRUCTIONS } from './security';
export { COST_INSTRUCTIONS } from './cost';
export { RELIABILITY_INSTRUCTIONS } from './reliability';
