import fs from 'fs';
import { z } from 'zod';

import type { JsonValue, MonitorConfig, ProbeMethod, QueryArgValue, TestDefinition } from '../types/probe';
import { ConfigurationError, getErrorMessage } from '../utils/errors';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

// An empty list is allowed here; the run reports it as a per-test error.
const acceptedCodesSchema = z.array(z.number().int().min(100).max(599));

const testSchema = z.object({
  url: z.string().trim().min(1),
  type: z.string().trim().min(1),
  accept: acceptedCodesSchema,
  payload: jsonValueSchema.optional(),
  query_args: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

const recipientListSchema = z.array(z.string().email()).min(1);

const contactsSchema = z
  .object({
    recipients: recipientListSchema,
    script_recipients: recipientListSchema.optional(),
    script_recipient: recipientListSchema.optional(),
    source: z.object({
      account: z.string().min(1),
      service: z.string().min(1),
    }),
  })
  .superRefine((val, ctx) => {
    if (val.script_recipients === undefined && val.script_recipient === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['script_recipients'],
        message: 'script_recipients is required',
      });
    }
  });

export const monitorConfigSchema = z.object({
  contacts: contactsSchema,
  email_metadata: z.object({
    subject: z.string().min(1),
  }),
  tests: z.record(testSchema),
});

export type RawMonitorConfig = z.infer<typeof monitorConfigSchema>;

export function parseProbeMethod(raw: string): ProbeMethod {
  const normalized = raw.trim().toLowerCase();
  switch (normalized) {
    case 'get':
      return { kind: 'retrieve' };
    case 'post':
      return { kind: 'submit' };
    default:
      return { kind: 'unsupported', raw: normalized };
  }
}

// A null query argument is left out of the request.
function toQueryArgs(raw: Record<string, QueryArgValue | null> | undefined): Record<string, QueryArgValue> | undefined {
  if (raw === undefined) return undefined;
  const args: Record<string, QueryArgValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== null) {
      args[key] = value;
    }
  }
  return args;
}

function toTestDefinition(name: string, raw: RawMonitorConfig['tests'][string]): TestDefinition {
  return {
    name,
    // Requested exactly as written; paths and tokens are case-sensitive.
    url: raw.url,
    method: parseProbeMethod(raw.type),
    payload: raw.payload,
    queryArgs: toQueryArgs(raw.query_args),
    acceptedCodes: raw.accept,
  };
}

export function parseMonitorConfig(input: unknown): MonitorConfig {
  const r = monitorConfigSchema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid monitor config: ${issues.join('; ')}`, { issues });
  }

  const { contacts, email_metadata, tests } = r.data;

  return {
    contacts: {
      recipients: contacts.recipients,
      scriptRecipients: contacts.script_recipients ?? contacts.script_recipient ?? [],
      source: contacts.source,
    },
    emailMetadata: { subject: email_metadata.subject },
    tests: Object.entries(tests).map(([name, test]) => toTestDefinition(name, test)),
  };
}

export function loadMonitorConfig(filePath: string): MonitorConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Error opening config file ${filePath}: ${getErrorMessage(error)}`, { filePath }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in config file ${filePath}: ${getErrorMessage(error)}`, { filePath }, { cause: error });
  }

  return parseMonitorConfig(parsed);
}
