import { httpProbes } from '../probes/http-probes.js';
import type { Scenario } from '../runner/scenario.js';
import type { Suite } from '../types/index.js';
import { uiScenarios } from './ui-scenarios.js';

export const allScenarios: Scenario[] = [...httpProbes, ...uiScenarios];

export interface ScenarioFilter {
  suite?: Suite;
  only?: string[];
}

export function selectScenarios(scenarios: Scenario[], filter: ScenarioFilter = {}): Scenario[] {
  return scenarios.filter((scenario) => {
    if (filter.suite && scenario.suite !== filter.suite) return false;
    if (filter.only && filter.only.length > 0 && !filter.only.includes(scenario.id)) return false;
    return true;
  });
}

/** Requested ids that name no scenario in the battery. */
export function unknownScenarioIds(scenarios: Scenario[], ids: string[]): string[] {
  const known = new Set(scenarios.map((scenario) => scenario.id));
  return ids.filter((id) => !known.has(id));
}
