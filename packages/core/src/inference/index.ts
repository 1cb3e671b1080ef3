export {
  InferenceClient,
  buildInferenceRequest,
  extractReply,
  REQUEST_TIMEOUT_MS,
  type InferenceClientOptions,
} from './client.ts';
export type {
  ChatRole,
  ChatTurn,
  CollectionRef,
  Completer,
  FetchLike,
  InferenceRequest,
  QueryContext,
} from './types.ts';
