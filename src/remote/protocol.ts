/**
 * @file    remote/protocol.ts
 * @purpose JSON message formats for the remote-control channel.
 * @owner   Cursor Zoom Core
 * @depends zod, shared/types/zoom.ts
 */

import { z } from 'zod';
import { ZoomCommand, ZoomCommandType, ZoomStateSnapshot } from '../shared/types/zoom';

export enum InboundMessageType {
  ToggleZoom    = 'toggle_zoom',
  ToggleFollow  = 'toggle_follow',
  SetProfile    = 'set_profile',
  MousePosition = 'mouse_position',
  ClearMouse    = 'clear_mouse',
  Ping          = 'ping',
  GetState      = 'get_state',
}

export enum OutboundMessageType {
  Pong        = 'pong',
  StateUpdate = 'state_update',
  Error       = 'error',
}

export const InboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal(InboundMessageType.ToggleZoom) }),
  z.object({ type: z.literal(InboundMessageType.ToggleFollow) }),
  z.object({
    type: z.literal(InboundMessageType.SetProfile),
    profile: z.string().min(1),
  }),
  z.object({
    type: z.literal(InboundMessageType.MousePosition),
    x: z.number().finite(),
    y: z.number().finite(),
  }),
  z.object({ type: z.literal(InboundMessageType.ClearMouse) }),
  z.object({ type: z.literal(InboundMessageType.Ping) }),
  z.object({ type: z.literal(InboundMessageType.GetState) }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export type OutboundMessage =
  | { type: OutboundMessageType.Pong }
  | ({ type: OutboundMessageType.StateUpdate } & ZoomStateSnapshot)
  | { type: OutboundMessageType.Error; message: string };

/** What a single inbound frame asks for */
export type ParsedFrame =
  | { kind: 'command'; command: ZoomCommand }
  | { kind: 'ping' }
  | { kind: 'get_state' }
  | { kind: 'invalid'; error: string };

export function parseInboundFrame(raw: string): ParsedFrame {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return { kind: 'invalid', error: 'Frame is not valid JSON' };
  }

  const result = InboundMessageSchema.safeParse(decoded);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    return { kind: 'invalid', error: `${where}${first ? first.message : 'invalid message'}` };
  }

  const msg = result.data;
  switch (msg.type) {
    case InboundMessageType.Ping:
      return { kind: 'ping' };
    case InboundMessageType.GetState:
      return { kind: 'get_state' };
    case InboundMessageType.ToggleZoom:
      return { kind: 'command', command: { type: ZoomCommandType.ToggleZoom } };
    case InboundMessageType.ToggleFollow:
      return { kind: 'command', command: { type: ZoomCommandType.ToggleFollow } };
    case InboundMessageType.SetProfile:
      return { kind: 'command', command: { type: ZoomCommandType.SetProfile, name: msg.profile } };
    case InboundMessageType.MousePosition:
      return {
        kind: 'command',
        command: { type: ZoomCommandType.SetMouseOverride, x: msg.x, y: msg.y },
      };
    case InboundMessageType.ClearMouse:
      return { kind: 'command', command: { type: ZoomCommandType.ClearMouseOverride } };
  }
}

export function encodeOutbound(msg: OutboundMessage): string {
  return JSON.stringify(msg);
}
