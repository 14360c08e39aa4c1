import type { Target } from '../config/run-config';
import type { EventLogger } from '../logging/event-logger';
import { buildRequest } from '../request/builder';
import { parseStatusLine } from '../responses/status-line';
import type { Scenario } from '../scenarios/types';
import { exchange as tcpExchange } from '../transport/transport';
import type { Exchange, ExchangeResult } from '../transport/transport';
import type { Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { decodeForDisplay } from '../utils/text';

export type RunnerOptions = {
  scenarios: Scenario[];
  target: Target;
  eventLogger: EventLogger;
  pauseMs: number;
  // Replaces every scenario's own timeout when set.
  timeoutMs?: number;
  exchange?: Exchange;
  logger?: Logger;
};

export type ScenarioOutcome =
  | {
      scenarioId: string;
      type: 'build-failed';
      message: string;
    }
  | {
      scenarioId: string;
      type: 'exchanged';
      request: Buffer;
      result: ExchangeResult;
    };

const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : 'Unknown build error';
};

const reportResult = (eventLogger: EventLogger, scenarioId: string, result: ExchangeResult): void => {
  if (result.type === 'error') {
    const partial = result.response.length > 0
      ? {
          bytes: result.response.length,
          status: parseStatusLine(result.response)?.status,
          text: decodeForDisplay(result.response),
        }
      : {};
    eventLogger.emitEvent({
      event: 'scenario-failed',
      scenarioId,
      stage: result.stage,
      code: result.code,
      message: result.message,
      ...partial,
    });
    return;
  }

  eventLogger.emitEvent({
    event: 'response-received',
    scenarioId,
    termination: result.type,
    bytes: result.response.length,
    status: parseStatusLine(result.response)?.status,
    text: decodeForDisplay(result.response),
  });
};

/**
 * Runs scenarios one after another, each over its own connection. A failing
 * scenario is reported and the run moves on; there is no overall verdict.
 */
export const runScenarios = async ({
  scenarios,
  target,
  eventLogger,
  pauseMs,
  timeoutMs,
  exchange = tcpExchange,
  logger,
}: RunnerOptions): Promise<ScenarioOutcome[]> => {
  const outcomes: ScenarioOutcome[] = [];

  for (const [index, scenario] of scenarios.entries()) {
    if (index > 0) {
      await sleep(pauseMs);
    }

    eventLogger.emitEvent({
      event: 'scenario-start',
      scenarioId: scenario.id,
      description: scenario.description,
      index,
      total: scenarios.length,
    });

    let request: Buffer;
    try {
      request = buildRequest(scenario.build(target));
    } catch (error) {
      const message = describeError(error);
      eventLogger.emitEvent({
        event: 'scenario-failed',
        scenarioId: scenario.id,
        stage: 'build',
        message,
      });
      outcomes.push({ scenarioId: scenario.id, type: 'build-failed', message });
      continue;
    }

    eventLogger.emitEvent({
      event: 'request-sent',
      scenarioId: scenario.id,
      bytes: request.length,
      text: decodeForDisplay(request),
    });

    const result = await exchange({
      host: target.host,
      port: target.port,
      request,
      timeoutMs: timeoutMs ?? scenario.timeoutMs,
      logger,
    });

    reportResult(eventLogger, scenario.id, result);
    outcomes.push({ scenarioId: scenario.id, type: 'exchanged', request, result });
  }

  const failed = outcomes.filter(
    (outcome) => outcome.type === 'build-failed' || outcome.result.type === 'error'
  ).length;

  eventLogger.emitEvent({
    event: 'run-complete',
    total: outcomes.length,
    responded: outcomes.length - failed,
    failed,
    uploads: scenarios.filter((scenario) => scenario.source === 'upload').length,
  });

  return outcomes;
};
