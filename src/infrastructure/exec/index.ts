export { runProcess } from './process-runner.js';
