/**
 * SignalR JSON hub protocol framing.
 *
 * Every message is a JSON object terminated by the ASCII record separator.
 * One websocket payload may carry several messages.
 */

import { z } from 'zod';

export const RECORD_SEPARATOR = '\u001e';

export enum HubMessageType {
  INVOCATION = 1,
  STREAM_ITEM = 2,
  COMPLETION = 3,
  STREAM_INVOCATION = 4,
  CANCEL_INVOCATION = 5,
  PING = 6,
  CLOSE = 7,
}

const invocationSchema = z.object({
  type: z.literal(HubMessageType.INVOCATION),
  target: z.string(),
  arguments: z.array(z.unknown()).default([]),
  invocationId: z.string().optional(),
});

const completionSchema = z.object({
  type: z.literal(HubMessageType.COMPLETION),
  invocationId: z.string(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const pingSchema = z.object({ type: z.literal(HubMessageType.PING) });

const closeSchema = z.object({
  type: z.literal(HubMessageType.CLOSE),
  error: z.string().optional(),
  allowReconnect: z.boolean().optional(),
});

const otherSchema = z.object({
  type: z.union([
    z.literal(HubMessageType.STREAM_ITEM),
    z.literal(HubMessageType.STREAM_INVOCATION),
    z.literal(HubMessageType.CANCEL_INVOCATION),
  ]),
});

const hubMessageSchema = z.union([
  invocationSchema,
  completionSchema,
  pingSchema,
  closeSchema,
  otherSchema,
]);

/** The server's reply to the protocol handshake carries no `type`. */
const handshakeResponseSchema = z.object({ error: z.string().optional() }).strict();

export type InvocationMessage = z.infer<typeof invocationSchema>;
export type CompletionMessage = z.infer<typeof completionSchema>;
export type HubMessage = z.infer<typeof hubMessageSchema>;

export type DecodedFrame =
  | { kind: 'handshake'; error?: string }
  | { kind: 'message'; message: HubMessage };

export interface DecodeResult {
  frames: DecodedFrame[];
  /** Records that were not valid JSON or not a known message shape. */
  malformed: string[];
}

export function encodeRecord(message: object): string {
  return `${JSON.stringify(message)}${RECORD_SEPARATOR}`;
}

export function encodeHandshake(): string {
  return encodeRecord({ protocol: 'json', version: 1 });
}

export function encodeInvocation(target: string, args: unknown[], invocationId?: string): string {
  const message: Record<string, unknown> = { type: HubMessageType.INVOCATION, target, arguments: args };
  if (invocationId !== undefined) {
    message.invocationId = invocationId;
    message.streamIds = [];
  }
  return encodeRecord(message);
}

export function encodePing(): string {
  return encodeRecord({ type: HubMessageType.PING });
}

export function decodeFrames(payload: string): DecodeResult {
  const result: DecodeResult = { frames: [], malformed: [] };
  for (const record of payload.split(RECORD_SEPARATOR)) {
    if (!record.trim()) continue;

    let json: unknown;
    try {
      json = JSON.parse(record);
    } catch {
      result.malformed.push(record);
      continue;
    }

    const message = hubMessageSchema.safeParse(json);
    if (message.success) {
      result.frames.push({ kind: 'message', message: message.data });
      continue;
    }
    const handshake = handshakeResponseSchema.safeParse(json);
    if (handshake.success) {
      result.frames.push({ kind: 'handshake', error: handshake.data.error });
      continue;
    }
    result.malformed.push(record);
  }
  return result;
}
