// Runs one analysis against the LLM endpoint configured in .env (LLM_BASE_URL, LLM_MODEL).
// .env is read from the working directory.
// Usage: tsx scripts/run-analysis.ts [path/to/context.json]

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { buildActionPlan, getAnalysisOrchestrator } from '../src/services/analysis';
import { getLlmConfig } from '../src/lib/config-parser';

async function main() {
  const contextPath = path.resolve(
    process.argv[2] ?? path.join(__dirname, 'fixtures/busy-web-host.json')
  );
  const snapshot: unknown = JSON.parse(readFileSync(contextPath, 'utf8'));
  const llm = getLlmConfig();

  console.log('--- Multi-agent performance analysis ---');
  console.log(`Context: ${contextPath}`);
  console.log(`Model: ${llm.model} @ ${llm.baseUrl}`);

  const outcome = await getAnalysisOrchestrator().analyzeDetailed(snapshot);
  const { result } = outcome;

  console.log(
    `\nTier: ${result.qualityTier} | agents: ${result.participatingAgents} | consensus: ${result.consensusScore} | ${result.executionTime}ms (${outcome.path})`
  );
  for (const agent of outcome.agents) {
    console.log(`  ${agent.agent}: ${agent.status} in ${agent.durationMs}ms${agent.failureReason ? ` (${agent.failureReason})` : ''}`);
  }

  console.log('\n[Insights]');
  for (const insight of result.insights) {
    console.log(`- [${insight.severity}] ${insight.title} (${insight.component}, ${insight.confidence}%)`);
    console.log(`  ${insight.observation}`);
    console.log(`  Root cause: ${insight.rootCause}`);
    console.log(`  Action: ${insight.immediateAction}`);
  }

  const plan = buildActionPlan(result);
  console.log('\n[Recommendations]');
  plan.recommendations.forEach((item, index) => console.log(`${index + 1}. ${item}`));
  console.log('\n[Next steps]');
  plan.nextSteps.forEach((item) => console.log(`- ${item}`));
}

main().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error('\nAnalysis failed:', errorMessage);
  process.exitCode = 1;
});
