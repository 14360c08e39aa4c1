import { ConfigError } from '../config/run-config';
import type { Scenario } from './types';

/**
 * Keeps the requested scenarios in catalogue order. An empty id list keeps
 * everything; an unknown id is a configuration error.
 */
export const filterScenarios = (scenarios: Scenario[], ids: string[]): Scenario[] => {
  if (ids.length === 0) return scenarios;

  const known = new Set(scenarios.map((scenario) => scenario.id));
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigError('scenario', `Unknown scenario id(s): ${unknown.join(', ')}`);
  }

  const wanted = new Set(ids);
  return scenarios.filter((scenario) => wanted.has(scenario.id));
};
