/**
 * Handles one registry request message: decode, validate, dispatch against the
 * registry, build the reply. Never throws; every failure becomes an
 * `ok: false` response.
 */

import {
  ObjectName,
  ObjectNameError,
  RegistryError,
  RegistryRequestSchema,
  decodeJson,
  errorMessage,
  type Logger,
  type RegistryConnection,
  type RegistryRequest,
  type RegistryResponse,
} from "@mbeankit/core";

const LOG_PREFIX = "mbeankit-agent:handler";

export interface HandleMessageParams {
  /** Raw request body (JSON string or buffer) */
  body: string | Uint8Array;
  /** Registry the request is answered from */
  registry: RegistryConnection;
  log?: Logger;
}

export async function handleMessage(params: HandleMessageParams): Promise<RegistryResponse> {
  const { body, registry, log = console } = params;

  let raw: unknown;
  try {
    raw = decodeJson(body);
  } catch (err) {
    log.warn?.({ error: errorMessage(err) }, `${LOG_PREFIX}:handleMessage - Invalid JSON`);
    return failure("", "INVALID_REQUEST", "Invalid JSON body");
  }

  const parsed = RegistryRequestSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn?.({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:handleMessage - Invalid request`);
    return failure(requestIdOf(raw), "INVALID_REQUEST", "Invalid registry request", parsed.error.flatten());
  }

  const request = parsed.data;
  try {
    const result = await dispatch(request, registry);
    return { id: request.id, ok: true, result };
  } catch (err) {
    if (err instanceof RegistryError) {
      return failure(request.id, err.code, err.message, err.details);
    }
    if (err instanceof ObjectNameError) {
      return failure(request.id, "INVALID_REQUEST", err.message);
    }
    const name = err instanceof Error ? err.name : "Error";
    log.error?.(
      { op: request.op, error: errorMessage(err) },
      `${LOG_PREFIX}:handleMessage - Request failed`,
    );
    return failure(
      request.id,
      request.op === "invoke" ? "INVOCATION_FAILED" : "INTERNAL_ERROR",
      errorMessage(err),
      { name },
    );
  }
}

async function dispatch(request: RegistryRequest, registry: RegistryConnection): Promise<unknown> {
  switch (request.op) {
    case "isRegistered":
      return registry.isRegistered(ObjectName.parse(request.name));
    case "isInstanceOf":
      return registry.isInstanceOf(ObjectName.parse(request.name), request.typeName);
    case "queryAll": {
      const beans = await registry.queryAll();
      return beans.map((bean) => ({ typeName: bean.typeName, name: bean.name.canonicalName }));
    }
    case "invoke":
      return registry.invoke(ObjectName.parse(request.name), request.operation, request.args);
  }
}

function failure(id: string, code: string, message: string, details?: unknown): RegistryResponse {
  return { id, ok: false, error: { code, message, details } };
}

function requestIdOf(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return "";
}
