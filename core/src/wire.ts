/**
 * Registry request/response wire envelope (NATS request/reply).
 *
 * One subject per registry; the `op` field selects the registry operation.
 * Object names travel in their canonical string form.
 */

import { StringCodec } from "nats";
import { z } from "zod";

const sc = StringCodec();

export const RegistryOps = ["isRegistered", "isInstanceOf", "queryAll", "invoke"] as const;
export type RegistryOp = (typeof RegistryOps)[number];

export const RegistryRequestSchema = z.discriminatedUnion("op", [
  z.object({ id: z.string(), op: z.literal("isRegistered"), name: z.string() }),
  z.object({ id: z.string(), op: z.literal("isInstanceOf"), name: z.string(), typeName: z.string() }),
  z.object({ id: z.string(), op: z.literal("queryAll") }),
  z.object({
    id: z.string(),
    op: z.literal("invoke"),
    name: z.string(),
    operation: z.string(),
    args: z.array(z.unknown()),
  }),
]);

export type RegistryRequest = z.infer<typeof RegistryRequestSchema>;

export const RegistryErrorDetailSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

export type RegistryErrorDetail = z.infer<typeof RegistryErrorDetailSchema>;

export const RegistryResponseSchema = z.object({
  id: z.string(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: RegistryErrorDetailSchema.optional(),
});

export type RegistryResponse = z.infer<typeof RegistryResponseSchema>;

export const RegisteredBeanWireSchema = z.object({
  typeName: z.string(),
  name: z.string(),
});

export const QueryAllResultSchema = z.array(RegisteredBeanWireSchema);

/** @throws TypeError for values JSON cannot represent (bigint, cycles) */
export function encodeJson(value: unknown): Uint8Array {
  return sc.encode(JSON.stringify(value));
}

export function decodeJson(data: Uint8Array | string): unknown {
  const text = typeof data === "string" ? data : sc.decode(data);
  return JSON.parse(text);
}
