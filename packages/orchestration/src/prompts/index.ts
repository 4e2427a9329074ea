export { AGENT_LIST_PLACEHOLDER, CONDUCTOR_SYSTEM_PROMPT, buildSystemPrompt } from './system-prompt.js';
export { buildTurnPrompt } from './turn-prompt.js';
export type { TurnPromptInput } from './turn-prompt.js';
