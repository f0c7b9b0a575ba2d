import type { ClassifiedResult, ProbeOutcome, TestDefinition } from '../types/probe';

export const NO_ACCEPTED_CODES_DETAIL = 'No accepted status codes configured';

export function classify(test: TestDefinition, outcome: ProbeOutcome): ClassifiedResult {
  // A definition that can never succeed is a configuration fault, not an outage.
  if (test.acceptedCodes.length === 0) {
    return {
      testName: test.name,
      status: 'ERROR',
      detail: NO_ACCEPTED_CODES_DETAIL,
      statusCode: outcome.kind === 'response' ? outcome.statusCode : null,
    };
  }

  switch (outcome.kind) {
    case 'response':
      return {
        testName: test.name,
        status: test.acceptedCodes.includes(outcome.statusCode) ? 'UP' : 'DOWN',
        detail: String(outcome.statusCode),
        statusCode: outcome.statusCode,
      };
    case 'failure':
      return {
        testName: test.name,
        status: 'ERROR',
        detail: outcome.description,
        statusCode: null,
      };
  }
}
