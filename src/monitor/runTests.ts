import type {
  ClassifiedResult,
  Contacts,
  NotificationEntry,
  NotificationRequest,
  Notifier,
  ProbeOutcome,
  RunSummary,
  TestDefinition,
} from '../types/probe';
import { getErrorMessage } from '../utils/errors';
import { logger as defaultLogger, type LoggerService } from '../utils/logger';
import { classify } from './classifyResult';
import { ProbeExecutor } from './executeProbe';

const RESPONSE_EXCERPT_LENGTH = 500;

type RunLogger = Pick<LoggerService, 'info' | 'warn' | 'error' | 'debug'>;

export interface ProbeRunnerOptions {
  executor?: Pick<ProbeExecutor, 'execute'>;
  logger?: RunLogger;
}

export class ProbeRunner {
  private executor: Pick<ProbeExecutor, 'execute'>;
  private logger: RunLogger;

  constructor(options: ProbeRunnerOptions = {}) {
    this.executor = options.executor ?? new ProbeExecutor();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Probes every test in order. A failing test, whatever the cause, only
   * affects its own result.
   */
  public async run(tests: TestDefinition[]): Promise<RunSummary> {
    if (tests.length === 0) {
      this.logger.warn('No tests configured; nothing to probe');
    }

    const results: ClassifiedResult[] = [];

    for (const test of tests) {
      const outcome = await this.executeContained(test);
      const result = classify(test, outcome);
      this.logResult(test, result, outcome);
      results.push(result);
    }

    const summary = summarize(results);
    this.logger.info(
      `Run complete: ${results.length - summary.down.length - summary.errors.length} up, ${summary.down.length} down, ${summary.errors.length} error`
    );
    return summary;
  }

  public async runAndNotify(
    tests: TestDefinition[],
    contacts: Contacts,
    notifier: Notifier
  ): Promise<RunSummary> {
    const summary = await this.run(tests);

    for (const request of planNotifications(summary, tests, contacts)) {
      this.logger.warn(`Sending ${request.category} notification`, {
        recipients: request.recipients,
        tests: request.entries.map((entry) => entry.testName),
      });
      await notifier.send(request);
    }

    return summary;
  }

  private async executeContained(test: TestDefinition): Promise<ProbeOutcome> {
    try {
      return await this.executor.execute(test);
    } catch (error) {
      return {
        kind: 'failure',
        reason: 'transport',
        description: `Unexpected probe failure: ${getErrorMessage(error)}`,
      };
    }
  }

  private logResult(test: TestDefinition, result: ClassifiedResult, outcome: ProbeOutcome): void {
    switch (result.status) {
      case 'UP':
        this.logger.info(`Test ${test.name} up (${result.detail})`);
        break;
      case 'DOWN':
        this.logger.warn(`Test ${test.name} down`, {
          url: test.url,
          expected: test.acceptedCodes,
          got: result.statusCode,
          content: outcome.kind === 'response' ? outcome.responseText.slice(0, RESPONSE_EXCERPT_LENGTH) : undefined,
        });
        break;
      case 'ERROR':
        this.logger.error(`Test ${test.name} could not be evaluated: ${result.detail}`, { url: test.url });
        break;
    }
  }
}

export function summarize(results: ClassifiedResult[]): RunSummary {
  return {
    results,
    down: results.filter((result) => result.status === 'DOWN'),
    errors: results.filter((result) => result.status === 'ERROR'),
  };
}

export function planNotifications(
  summary: RunSummary,
  tests: TestDefinition[],
  contacts: Contacts
): NotificationRequest[] {
  const down: NotificationEntry[] = [];
  const errors: NotificationEntry[] = [];

  // results[i] was produced from tests[i]; names need not be unique.
  summary.results.forEach((result, index) => {
    const test: TestDefinition | undefined = tests[index];
    const entry: NotificationEntry = {
      testName: result.testName,
      detail: result.detail,
      url: test?.url ?? '',
      acceptedCodes: test?.acceptedCodes ?? [],
    };
    if (result.status === 'DOWN') {
      down.push(entry);
    } else if (result.status === 'ERROR') {
      errors.push(entry);
    }
  });

  const requests: NotificationRequest[] = [];

  if (down.length > 0) {
    requests.push({
      category: 'SERVICE_DOWN',
      recipients: contacts.recipients,
      entries: down,
    });
  }

  if (errors.length > 0) {
    requests.push({
      category: 'SCRIPT_ERROR',
      recipients: contacts.scriptRecipients,
      entries: errors,
    });
  }

  return requests;
}
