export { Scratchpad, DEFAULT_SCRATCHPAD_MAX_ITEMS } from './scratchpad.js';
export { TodoList, DEFAULT_TODO_MAX_ITEMS, type TodoItem } from './todo.js';
export {
    ConversationHistory,
    DEFAULT_HISTORY_MAX_TURNS,
    formatTurn,
    type TurnRecord,
} from './conversation-history.js';
