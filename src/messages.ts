/**
 * Wire format between the assistant and its clients
 *
 * Inbound messages are validated with Zod before they reach a session;
 * outbound messages are built through `createMessage` so every one carries
 * a timestamp.
 */

import { z } from 'zod';
import { ProtocolViolationError } from './errors';
import type {
  PendingQuestion,
  QuestionKind,
  QuestionOption,
} from './types/graph.types';

export type OutboundMessageType =
  | 'assistant'
  | 'assistant_thinking'
  | 'question'
  | 'options'
  | 'confirmation'
  | 'error'
  | 'system'
  | 'user';

export type OutboundMessage = {
  type: OutboundMessageType;
  message: string;
  /** Milliseconds since the epoch */
  timestamp: number;
  question_id?: string;
  options?: QuestionOption[];
  question_number?: number;
  total_questions?: number;
  disable_input?: boolean;
};

/** Delivers one message to the client that owns a session */
export type Emitter = (message: OutboundMessage) => void;

type MessageExtras = Omit<
  Partial<OutboundMessage>,
  'type' | 'message' | 'timestamp'
>;

export function createMessage(
  type: OutboundMessageType,
  message: string,
  extras: MessageExtras = {}
): OutboundMessage {
  return { type, message, timestamp: Date.now(), ...extras };
}

const QUESTION_MESSAGE_TYPES: Record<QuestionKind, OutboundMessageType> = {
  free_text: 'question',
  multiple_choice: 'options',
  yes_no: 'confirmation',
};

/**
 * Outbound form of an open question
 */
export function questionMessage(question: PendingQuestion): OutboundMessage {
  return createMessage(QUESTION_MESSAGE_TYPES[question.kind], question.message, {
    question_id: question.id,
    options: question.options,
    question_number: question.questionNumber,
    total_questions: question.totalQuestions,
    disable_input: false,
  });
}

export const LocationSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  timezone: z.string().optional(),
  state: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string().optional(),
});

export const InboundMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('handshake'),
    location: LocationSchema.optional(),
  }),
  z.object({
    type: z.literal('user_message'),
    message: z.string().trim().min(1),
  }),
  z.object({
    type: z.literal('user_response'),
    question_id: z.string().min(1),
    response: z.string(),
  }),
  z.object({ type: z.literal('cancel') }),
  z.object({ type: z.literal('reset') }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

/**
 * Parse one raw frame from a client
 * @throws ProtocolViolationError on invalid JSON or an unknown shape
 */
export function parseInboundMessage(raw: string): InboundMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ProtocolViolationError('Inbound frame is not valid JSON');
  }

  const result = InboundMessageSchema.safeParse(data);
  if (!result.success) {
    throw new ProtocolViolationError(
      `Malformed inbound message: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || 'type'} ${issue.message}`)
        .join('; ')}`
    );
  }
  return result.data;
}
