/**
 * TEMPORAL WORKER
 *
 * The AppEffects implementations are registered directly as activities. Each
 * method is bound to its repository and given a unique, flat name matching
 * the proxies in sellerRequests.workflow.ts.
 */
import {AppEffects} from '../pure/effects';
import {Activities} from './activities';
import {SELLER_REQUESTS_TASK_QUEUE} from './client';
import {NativeConnection, Worker} from '@temporalio/worker';

export function toActivities(effects: AppEffects): Activities {
  return {
    hasPermission: effects.authorization.hasPermission.bind(effects.authorization),
    getStoreById: effects.stores.getById.bind(effects.stores),
    getCategoryById: effects.catalog.getCategoryById.bind(effects.catalog),
    getUserById: effects.users.getById.bind(effects.users),
    getContentManagers: effects.users.getContentManagers.bind(effects.users),
    createProductRequest: effects.requests.createProductRequest.bind(effects.requests),
    createSellerAccessRequest: effects.requests.createSellerAccessRequest.bind(effects.requests),
    sendEmail: effects.notifications.sendEmail.bind(effects.notifications),
  };
}

/**
 * Create a Temporal worker for the seller request workflows
 *
 * @param effects - the application's effect implementations
 * @param namespace - Temporal namespace (defaults to 'default')
 * @param taskQueue - task queue name (defaults to 'seller-requests')
 */
export async function createWorker(
  effects: AppEffects,
  namespace = process.env.TEMPORAL_NAMESPACE || 'default',
  taskQueue = SELLER_REQUESTS_TASK_QUEUE
): Promise<Worker> {
  const connection = await NativeConnection.connect({
    address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
  });

  return await Worker.create({
    connection,
    namespace,
    taskQueue,
    workflowsPath: require.resolve('./sellerRequests.workflow'),
    activities: toActivities(effects),
    maxConcurrentActivityTaskExecutions: 10,
    maxConcurrentWorkflowTaskExecutions: 10,
  });
}

export async function runWorker(effects: AppEffects): Promise<void> {
  const worker = await createWorker(effects);

  console.log('🏃 Temporal worker starting...');
  console.log(`📦 Task queue: ${SELLER_REQUESTS_TASK_QUEUE}`);
  console.log('🌐 Temporal address:', process.env.TEMPORAL_ADDRESS || 'localhost:7233');

  await worker.run();
}
