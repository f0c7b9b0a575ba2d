import { describe, expect, it } from 'vitest';

import { classify, NO_ACCEPTED_CODES_DETAIL } from '../src/monitor/classifyResult';
import { buildTest } from './helpers/data-builders';

describe('monitor/classifyResult', () => {
  it('marks accepted status codes as up', () => {
    const test = buildTest({ acceptedCodes: [200, 204] });

    expect(classify(test, { kind: 'response', statusCode: 204, responseText: '' })).toEqual({
      testName: 'api',
      status: 'UP',
      detail: '204',
      statusCode: 204,
    });
  });

  it('marks status codes outside the accepted set as down with the code as detail', () => {
    const test = buildTest({ acceptedCodes: [200] });

    expect(classify(test, { kind: 'response', statusCode: 503, responseText: 'busy' })).toEqual({
      testName: 'api',
      status: 'DOWN',
      detail: '503',
      statusCode: 503,
    });
  });

  it('marks transport failures and unsupported methods as errors', () => {
    const test = buildTest();

    expect(
      classify(test, { kind: 'failure', reason: 'transport', description: 'Request timed out after 60000ms' })
    ).toEqual({
      testName: 'api',
      status: 'ERROR',
      detail: 'Request timed out after 60000ms',
      statusCode: null,
    });
    expect(
      classify(test, { kind: 'failure', reason: 'unsupported_method', description: 'Unsupported method "put"' })
        .status
    ).toBe('ERROR');
  });

  it('treats an empty accepted set as a configuration error whatever the response', () => {
    const test = buildTest({ acceptedCodes: [] });

    for (const statusCode of [200, 404, 503]) {
      expect(classify(test, { kind: 'response', statusCode, responseText: '' })).toEqual({
        testName: 'api',
        status: 'ERROR',
        detail: NO_ACCEPTED_CODES_DETAIL,
        statusCode,
      });
    }
    expect(classify(test, { kind: 'failure', reason: 'transport', description: 'Connection refused' }).detail).toBe(
      NO_ACCEPTED_CODES_DETAIL
    );
  });
});
