export const BACKEND_INVOKER = 'BACKEND_INVOKER';
export const BACKEND_OPTIONS = 'BACKEND_OPTIONS';
export const INVOCATION_OBSERVER = 'INVOCATION_OBSERVER';

export const CHAT_COMPLETION_SPAN = 'backend.chat_completion';

export const CORS_RESPONSE_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': '*',
  'Access-Control-Allow-Headers': '*',
};
