export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type QueryArgValue = string | number | boolean;

export type ProbeMethod =
  | { kind: 'retrieve' }
  | { kind: 'submit' }
  | { kind: 'unsupported'; raw: string };

export interface TestDefinition {
  name: string;
  url: string;
  method: ProbeMethod;
  payload?: JsonValue | undefined;
  queryArgs?: Record<string, QueryArgValue> | undefined;
  acceptedCodes: number[];
}

export type ProbeFailureReason = 'transport' | 'unsupported_method';

export type ProbeOutcome =
  | { kind: 'response'; statusCode: number; responseText: string }
  | { kind: 'failure'; reason: ProbeFailureReason; description: string };

export type ResultStatus = 'UP' | 'DOWN' | 'ERROR';

export interface ClassifiedResult {
  testName: string;
  status: ResultStatus;
  detail: string;
  statusCode: number | null;
}

export interface RunSummary {
  results: ClassifiedResult[];
  down: ClassifiedResult[];
  errors: ClassifiedResult[];
}

export type NotificationCategory = 'SERVICE_DOWN' | 'SCRIPT_ERROR';

export interface NotificationEntry {
  testName: string;
  detail: string;
  url: string;
  acceptedCodes: number[];
}

export interface NotificationRequest {
  category: NotificationCategory;
  recipients: string[];
  entries: NotificationEntry[];
}

export interface Contacts {
  recipients: string[];
  scriptRecipients: string[];
  source: {
    account: string;
    service: string;
  };
}

export interface EmailMetadata {
  subject: string;
}

export interface MonitorConfig {
  contacts: Contacts;
  emailMetadata: EmailMetadata;
  tests: TestDefinition[];
}

export interface Notifier {
  send(request: NotificationRequest): Promise<void>;
}
