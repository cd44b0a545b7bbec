/**
 * Newsletter signup endpoint
 */

export { SignupStore, formatSignupLine } from './store.js';
export type { SignupSink } from './store.js';
export { SubscribeController, parseSignupEmail } from './controller.js';
export type { JsonResponder, SubscribeRequest, SubscribeResult } from './controller.js';
export { createServerApp, startServer } from './server.js';
export type { ServerAppOptions } from './server.js';
