/**
 * @streamwire/core/multicast
 */

export { MulticastSource, type SubscribeOptions } from "./multicast-source.js"
