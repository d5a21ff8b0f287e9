export { runFcfs } from './fcfs.js';
export { runSjf } from './sjf.js';
export { runSrtf } from './srtf.js';
export { runRoundRobin } from './round-robin.js';
export { DriverRun } from './DriverRun.js';
