/**
 * Every envelope type understood on the wire
 */
export const MESSAGE_TYPES = [
  'session_join',
  'session_leave',
  'session_update',
  'session_sync',
  'participant_join',
  'participant_leave',
  'exercise_add',
  'exercise_update',
  'exercise_delete',
  'set_add',
  'set_update',
  'set_delete',
  'set_complete',
  'set_reorder',
  'cursor_move',
  'sync_request',
  'sync_response',
  'error',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

const MESSAGE_TYPE_SET: ReadonlySet<string> = new Set(MESSAGE_TYPES);

export function isMessageType(value: string): value is MessageType {
  return MESSAGE_TYPE_SET.has(value);
}
