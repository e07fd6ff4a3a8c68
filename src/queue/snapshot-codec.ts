import { Ajv, type ValidateFunction } from "ajv";

import { MAX_SOLO_RUN, isParticipantId } from "../types.js";
import type { WaitlistState } from "./waitlist.js";

export const SNAPSHOT_VERSION = 1;

export interface PersistedSnapshot {
  version: typeof SNAPSHOT_VERSION;
  entries: string[];
  soloRun: boolean;
}

const SNAPSHOT_SCHEMA = {
  type: "object",
  properties: {
    version: { const: SNAPSHOT_VERSION },
    entries: {
      type: "array",
      items: { type: "string", minLength: 1, maxLength: 128, pattern: "^[^\\s](?:[^\\r\\n]*[^\\s])?$" }
    },
    soloRun: { type: "boolean" }
  },
  required: ["version", "entries", "soloRun"],
  additionalProperties: false
} as const;

export class SnapshotDecodeError extends Error {}

const ajv = new Ajv({ strict: false, allErrors: true });
const validateSnapshot: ValidateFunction<PersistedSnapshot> = ajv.compile<PersistedSnapshot>(SNAPSHOT_SCHEMA);

export function encodeSnapshot(state: WaitlistState): string {
  for (const entry of state.entries) {
    if (!isParticipantId(entry)) {
      throw new TypeError(`participant id cannot be persisted: ${JSON.stringify(entry)}`);
    }
  }
  const payload: PersistedSnapshot = {
    version: SNAPSHOT_VERSION,
    entries: [...state.entries],
    soloRun: state.entries.length > 0 && state.soloRun
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export function decodeSnapshot(raw: string): WaitlistState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotDecodeError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!validateSnapshot(parsed)) {
    const detail = (validateSnapshot.errors ?? [])
      .map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
      .join("; ");
    throw new SnapshotDecodeError(detail || "schema mismatch");
  }
  const [first] = parsed.entries;
  if (
    parsed.soloRun &&
    first !== undefined &&
    (parsed.entries.length > MAX_SOLO_RUN || parsed.entries.some((entry) => entry !== first))
  ) {
    throw new SnapshotDecodeError(
      `/soloRun is set but entries are not a single participant's run of at most ${MAX_SOLO_RUN}`
    );
  }
  return {
    entries: [...parsed.entries],
    soloRun: parsed.entries.length > 0 && parsed.soloRun
  };
}
