export { createHttpSender } from './http-sender.js';
export type { HttpSenderOptions } from './http-sender.js';
