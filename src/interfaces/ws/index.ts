export { SubscriptionServer } from './websocket-server.js';
export type { SubscriptionServerOptions } from './websocket-server.js';
export {
  CloseCode,
  FEED_FIELDS,
  GRAPHQL_TRANSPORT_WS,
  SubscriptionSession,
  resolveOperation,
} from './subscription-protocol.js';
export type { ServerMessage, SessionTransport } from './subscription-protocol.js';
