export { sweepGrantObjects, type SweepResult, type SweptObject } from './sweeper.js';
