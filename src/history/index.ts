export * as ChatHistory from './chat-history';
export * as ToolLog from './tool-log';
