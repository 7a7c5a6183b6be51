import { Orchestrator, type OrchestratorOptions } from '../orchestrator/orchestrator.js';
import type { ScenarioResult, Suite } from '../orchestrator/types.js';
import { SuiteAbortError } from '../errors.js';
import { multiUserSuite } from './multi-user.suite.js';
import { singleUserSuite } from './single-user.suite.js';

export { singleUserSuite } from './single-user.suite.js';
export { multiUserSuite } from './multi-user.suite.js';
export { defineSuite, scenario, joinChannel, expectJoinRejected, sendAndExpectNumeric, setChannelMode } from './steps.js';

export const ALL_SUITES: readonly Suite[] = [singleUserSuite, multiUserSuite];

export interface RunOptions extends Omit<OrchestratorOptions, 'host' | 'port'> {
  /** Run the suites concurrently instead of one after another */
  parallel?: boolean;
  suites?: readonly Suite[];
}

/**
 * Run suites against an orchestrator that has already been probed.
 *
 * @returns Every result, in the order the orchestrator recorded them
 */
export async function runSuites(
  orchestrator: Orchestrator,
  suites: readonly Suite[],
  parallel = false
): Promise<ScenarioResult[]> {
  if (parallel) {
    await Promise.all(suites.map(suite => suite.run(orchestrator)));
  } else {
    for (const suite of suites) {
      await suite.run(orchestrator);
    }
  }
  return [...orchestrator.results];
}

/**
 * Run every suite against the server at host:port.
 *
 * @throws SuiteAbortError if the server is unreachable at start, or no
 *   scenario could connect at all
 */
export async function runAllSuites(host: string, port: number, options: RunOptions = {}): Promise<ScenarioResult[]> {
  const { parallel = false, suites = ALL_SUITES, ...orchestratorOptions } = options;
  const orchestrator = new Orchestrator({ ...orchestratorOptions, host, port });

  await orchestrator.probe();
  const results = await runSuites(orchestrator, suites, parallel);

  if (results.length > 0 && results.every(result => result.connectFailed)) {
    throw new SuiteAbortError(`No scenario could connect to ${host}:${port}`, results);
  }
  return results;
}
