/**
 * Client construction
 * @module renterd-client/client
 */

export { Client, type ClientDependencies } from './client.js';
export { ClientBuilder } from './builder.js';
export { createClient, createClientFromEnv, type ClientOverrides } from './factory.js';
