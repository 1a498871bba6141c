import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ProcessEvent } from '../../domains/lock/models/lock.js';

/** Wire form of a process notification (snake_case, as pushed to the control API). */
export const ProcessEventPayloadSchema = Type.Object({
  process_id: Type.Integer({ minimum: 1 }),
  display_name: Type.String({ minLength: 1 }),
  kind: Type.Union([Type.Literal('launch'), Type.Literal('activate'), Type.Literal('terminate')]),
});

export type ProcessEventPayload = Static<typeof ProcessEventPayloadSchema>;

export type ParseResult = { ok: true; event: ProcessEvent } | { ok: false; errors: string[] };

/**
 * Validate an untyped notification payload once, at the boundary.
 * Unknown extra fields are ignored.
 */
export function parseProcessEvent(payload: unknown): ParseResult {
  if (!Value.Check(ProcessEventPayloadSchema, payload)) {
    const errors = [...Value.Errors(ProcessEventPayloadSchema, payload)].map(
      (error) => `${error.path || '/'}: ${error.message}`
    );
    return { ok: false, errors };
  }

  return {
    ok: true,
    event: {
      processId: payload.process_id,
      displayName: payload.display_name,
      kind: payload.kind,
    },
  };
}
