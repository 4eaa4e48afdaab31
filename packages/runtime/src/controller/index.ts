export { WorkQueue } from './work-queue.js';
export {
  GrantController,
  startGrantController,
  type GrantControllerOptions,
} from './controller.js';
