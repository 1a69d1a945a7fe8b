import { z } from "zod";
import { FormatError, ValidationError } from "../errors";
import {
  MAX_PREFIX_LENGTH,
  MIN_PREFIX_LENGTH,
  NAME_MAX_LENGTH,
  NodeType,
  PORT_NAME_MAX_LENGTH,
  TemplateVisibility,
  UserRole,
} from "../shared-types";

export const addressField = z.ipv4();
export const prefixLengthField = z.number().int().min(MIN_PREFIX_LENGTH).max(MAX_PREFIX_LENGTH);
export const nameField = z.string().trim().min(1).max(NAME_MAX_LENGTH);
const idField = z.number().int().positive();

export const UserInputSchema = z.object({
  username: z.string().trim().min(1).max(150),
  email: z.email().nullable().default(null),
});

export const ProfileInputSchema = z.object({
  userId: idField,
  organizationId: idField,
  role: z.enum(UserRole),
});

export const SimulatorInputSchema = z.object({
  name: nameField,
  address: addressField,
});

export const OrganizationInputSchema = z.object({
  name: nameField,
  parentId: idField.nullable().default(null),
  ownerId: idField,
});

export const TemplateInputSchema = z.object({
  name: nameField,
  ownerId: idField,
  organizationId: idField,
  visibility: z.enum(TemplateVisibility),
});

export const NodeInputSchema = z.object({
  templateId: idField,
  name: nameField,
  type: z.enum(NodeType),
});

export const PortInputSchema = z.object({
  nodeId: idField,
  name: z.string().trim().min(1).max(PORT_NAME_MAX_LENGTH),
});

export const LinkInputSchema = z.object({
  port1Id: idField,
  port2Id: idField,
  lossiness: z.number().min(0).max(1).default(0),
});

export const AssignmentInputSchema = z.object({
  topologyId: idField,
  portId: idField,
  address: addressField,
  mask: prefixLengthField,
});

export const BlockInputSchema = z.object({
  simulatorId: idField,
  organizationId: idField,
  parentId: idField.nullable().default(null),
  subnet: addressField,
  mask: prefixLengthField,
});

/**
 * Parse service input. Malformed addresses raise FormatError. Numbers and
 * enum codes outside their range, and fractions where an integer is due,
 * raise RangeError. Anything else raises ValidationError.
 */
export function parseInput<S extends z.ZodType>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.path.map(String).join(".");
  const message = field ? `${field}: ${issue.message}` : issue.message;

  if (issue.code === "invalid_format" && issue.format === "ipv4") {
    throw new FormatError(`Invalid IPv4 address for ${field}`);
  }
  if ((issue.code === "too_big" || issue.code === "too_small") && issue.origin === "number") {
    throw new RangeError(message);
  }
  if (issue.code === "invalid_type" && issue.expected === "int") {
    throw new RangeError(message);
  }
  if (issue.code === "invalid_value") {
    throw new RangeError(message);
  }
  throw new ValidationError(field, issue.message);
}
