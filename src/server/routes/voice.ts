/**
 * Voice-agent webhook
 *
 * The telephony provider posts call events; each reply says what the agent
 * should speak and whether the call goes on. The route keeps no call state:
 * every transcript is answered on its own.
 */

import type { FastifyInstance } from 'fastify';

import { PRODUCT_NAME, UNAVAILABLE_MESSAGE } from '../../agent/prompts.js';
import type { ServerContext } from '../context.js';
import { HttpError } from '../errors.js';
import { VoiceWebhookSchema, formatIssues } from '../schemas.js';
import { abortOnDisconnect } from './query.js';

export const VOICE_GREETING = `Hello! Thank you for calling ${PRODUCT_NAME} support. How can I help you today?`;
export const NO_SPEECH_MESSAGE = 'No speech detected.';
export const CALL_ENDED_MESSAGE = 'Call ended. Goodbye.';

export type VoiceAction = 'reply' | 'end_call';

export interface VoiceWebhookResponse {
  response: string;
  action?: VoiceAction;
}

export function registerVoiceRoutes(app: FastifyInstance, context: ServerContext): void {
  app.post('/api/v1/voice/webhook', async (request, reply): Promise<VoiceWebhookResponse> => {
    const parsed = VoiceWebhookSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new HttpError(422, `Invalid request body: ${formatIssues(parsed.error)}`);
    }
    const event = parsed.data;

    switch (event.status ?? event.type) {
      case 'call_started':
        context.logger.info({ callId: event.call_id }, 'Voice call started');
        return { response: VOICE_GREETING, action: 'reply' };

      case 'conversation_update': {
        const transcript = event.transcript?.trim();
        if (!transcript) {
          return { response: NO_SPEECH_MESSAGE };
        }
        const { init } = context;
        if (!init.ok) {
          throw new HttpError(503, UNAVAILABLE_MESSAGE);
        }
        const response = await init.chatbot.getResponse(transcript, {
          signal: abortOnDisconnect(reply),
        });
        return { response, action: 'reply' };
      }

      default:
        context.logger.info({ callId: event.call_id }, 'Voice call ended');
        return { response: CALL_ENDED_MESSAGE, action: 'end_call' };
    }
  });
}
