// examples/src/chat/chat.service.ts

import { Injectable } from '@nestjs/common';
import {
    buildTraceHeaders,
    ChatMessage,
    firstChoiceContent,
    LlmCallInstrumentation,
    ObservabilityLoggerService
} from '../../../src';
import { ChatReplyDto, ChatRequestDto } from './chat.dto';

const SYSTEM_PROMPT = 'You are a concise assistant.';
const ANONYMOUS_SESSION = 'anonymous';

@Injectable()
export class ChatService {
  private readonly histories = new Map<string, ChatMessage[]>();

  constructor(
    private readonly llm: LlmCallInstrumentation,
    private readonly logger: ObservabilityLoggerService
  ) {}

  async reply(request: ChatRequestDto): Promise<ChatReplyDto> {
    const historyKey = request.session_id ?? ANONYMOUS_SESSION;
    const history = this.histories.get(historyKey) ?? [];
    const question: ChatMessage = { role: 'user', content: request.message };

    const response = await this.llm.observedInstrumentedCompletion({
      tracerName: 'example-app/chat',
      spanName: 'chat.completion',
      generationName: 'chat-reply',
      model: process.env.CHAT_MODEL || 'gpt-4o-mini',
      messages: [{ role: 'system', content: SYSTEM_PROMPT }, ...history, question],
      userId: request.user_id,
      sessionId: request.session_id,
      extraSpanAttrs: { 'chat.history_length': history.length },
      params: {
        temperature: 0.2,
        extra_headers: buildTraceHeaders({ userId: request.user_id, sessionId: request.session_id })
      }
    });

    const content = firstChoiceContent(response);
    const reply = typeof content === 'string' ? content : '';
    const updated = [...history, question, { role: 'assistant', content: reply }];
    this.histories.set(historyKey, updated);

    this.logger.info('chat.reply', 'reply generated', {
      session_id: request.session_id ?? null,
      reply_length: reply.length
    });
    return { reply, session_id: request.session_id ?? null, turns: updated.length / 2 };
  }

  history(sessionId: string): ChatMessage[] | undefined {
    return this.histories.get(sessionId);
  }
}
