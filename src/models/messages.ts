import type { Context, ContextEntry } from '../context/types';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

function toConversationMessage(entry: ContextEntry): ConversationMessage {
  // Chat APIs only accept a tool role in reply to a tool call
  if (entry.role === 'assistant') return { role: 'assistant', content: entry.content };
  if (entry.role === 'tool') return { role: 'user', content: `[tool result]\n${entry.content}` };
  return { role: 'user', content: entry.content };
}

export function toChatMessages(context: Context): ChatMessage[] {
  return context.entries.map((entry): ChatMessage => (entry.role === 'system' ? { role: 'system', content: entry.content } : toConversationMessage(entry)));
}

/** Split a context into one system prompt and the remaining conversation */
export function splitSystemPrompt(context: Context): { system: string; messages: ConversationMessage[] } {
  const system = context.entries
    .filter((e) => e.role === 'system')
    .map((e) => e.content)
    .join('\n\n');
  const messages = context.entries.filter((e) => e.role !== 'system').map(toConversationMessage);
  return { system, messages };
}
