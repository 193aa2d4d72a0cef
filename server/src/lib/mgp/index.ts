/**
 * Mathematics Genealogy Project API integration modules
 */

export { createMgpClient, FetchError } from './client.js';
export type { MgpClient, MgpClientOptions } from './client.js';
export { listIdsByCountry, getMathematician, fetchWithRetry, createMgpSource } from './fetcher.js';
export type { MathematicianSource, RetryOptions } from './fetcher.js';
export { json2mathematician } from './transformer.js';
