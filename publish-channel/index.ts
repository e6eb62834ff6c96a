export { parseBindAddress } from './PublishChannel';
export type { PublishChannel, BindAddress } from './PublishChannel';
export { CREDENTIAL_ENV, loadChannelCredentials, isAuthorized } from './ChannelAuth';
export type { ChannelCredentials } from './ChannelAuth';
export { ConflatingSubscriber } from './ConflatingSubscriber';
export type { SubscriberSocket, SubscriberStats } from './ConflatingSubscriber';
export { WebSocketPublishChannel } from './WebSocketPublishChannel';
export type { PublishChannelConfig, PublishChannelStats } from './WebSocketPublishChannel';
