export { EdgexClient } from './client.js';
