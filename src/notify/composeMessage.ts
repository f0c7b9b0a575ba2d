import type { EmailMetadata, NotificationEntry, NotificationRequest } from '../types/probe';

export interface ComposedMessage {
  subject: string;
  text: string;
}

export function scriptErrorSubject(metadata: EmailMetadata): string {
  return `${metadata.subject} (script error)`;
}

function displayName(testName: string): string {
  return testName.replace(/_/g, ' ');
}

function formatDownEntry(entry: NotificationEntry): string {
  return [
    `Test \`${displayName(entry.testName)}\``,
    `\tURL: ${entry.url}`,
    `\tExpected status codes: [${entry.acceptedCodes.join(', ')}]`,
    `\tGot: ${entry.detail}`,
  ].join('\n');
}

function formatErrorEntry(entry: NotificationEntry): string {
  return [`Test \`${displayName(entry.testName)}\``, `\tURL: ${entry.url}`, `\tError: ${entry.detail}`].join('\n');
}

export function composeMessage(request: NotificationRequest, metadata: EmailMetadata): ComposedMessage {
  switch (request.category) {
    case 'SERVICE_DOWN':
      return {
        subject: metadata.subject,
        text: request.entries.map(formatDownEntry).join('\n\n'),
      };
    case 'SCRIPT_ERROR':
      return {
        subject: scriptErrorSubject(metadata),
        text: [
          `Script error while probing ${request.entries.length} test(s):`,
          ...request.entries.map(formatErrorEntry),
        ].join('\n\n'),
      };
  }
}

export function composeFatalErrorMessage(error: unknown, metadata: EmailMetadata): ComposedMessage {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error && error.stack ? `\n${error.stack}` : '';
  return {
    subject: scriptErrorSubject(metadata),
    text: `Script error: ${message}${stack}`,
  };
}
