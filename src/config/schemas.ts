import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";

export const mqttSettingsSchema = z.object({
  host: z.string().min(1).default("homeassistant"),
  port: z.number().int().min(1).max(65535).default(1883),
  username: z.string().optional(),
  password: z.string().optional(),
  clientName: z.string().min(1).optional(),
  useTls: z.boolean().default(false),
  tlsKey: z.string().optional(),
  tlsCertfile: z.string().optional(),
  tlsCaCert: z.string().optional(),
  discoveryPrefix: z.string().min(1).default("homeassistant"),
  statePrefix: z.string().min(1).default("hmd"),
});

export const deviceInfoSchema = z
  .object({
    name: z.string().min(1),
    identifiers: z.union([z.string(), z.array(z.string())]).optional(),
    connections: z.array(z.tuple([z.string(), z.string()])).optional(),
    manufacturer: z.string().optional(),
    model: z.string().optional(),
    swVersion: z.string().optional(),
    hwVersion: z.string().optional(),
    serialNumber: z.string().optional(),
    suggestedArea: z.string().optional(),
    viaDevice: z.string().optional(),
    configurationUrl: z.string().url().optional(),
  })
  .refine((device) => device.identifiers !== undefined || device.connections !== undefined, {
    message: "A device needs identifiers or connections",
  });

export const entityInfoSchema = z.object({
  name: z.string().min(1),
  uniqueId: z.string().min(1).optional(),
  objectId: z.string().min(1).optional(),
  icon: z.string().optional(),
  entityCategory: z.enum(["config", "diagnostic"]).optional(),
  enabledByDefault: z.boolean().optional(),
  expireAfter: z.number().int().positive().optional(),
  forceUpdate: z.boolean().optional(),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
  device: deviceInfoSchema.optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseWith<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  label: string,
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${label}: ${describeIssues(result.error)}`);
  }
  return result.data;
}
