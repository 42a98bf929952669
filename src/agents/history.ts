import type { ChatTurn } from '../gemini/types';
import type { ThreadMessage } from '../orchestrator/thread-state';

export function toChatTurns(messages: readonly ThreadMessage[]): ChatTurn[] {
  return messages.map((message) => ({
    role: message.role === 'assistant' ? 'model' : 'user',
    text: message.content,
  }));
}
