/**
 * WORKER STARTUP SCRIPT
 *
 * This script starts:
 * 1. A Temporal worker that executes the seller request workflows
 * 2. The storefront HTTP API
 *
 * Run this with: npm start
 */
import {makeAppEffects, ProductionEffects} from '../effects/EffectsFactory';
import {createApp} from '../api/app';
import {createRoutes} from '../api/routes';
import {runWorker} from './worker';
import {SELLER_REQUESTS_TASK_QUEUE, temporalSellerRequests} from './client';

let appEffects: ProductionEffects | null = null;

async function main() {
  console.log('🚀 Starting storefront API and Temporal worker...\n');

  try {
    appEffects = await makeAppEffects();

    console.log('📋 Configuration:');
    console.log('   - Temporal Server:', process.env.TEMPORAL_ADDRESS || 'localhost:7233');
    console.log('   - Namespace:', process.env.TEMPORAL_NAMESPACE || 'default');
    console.log(`   - Task Queue: ${SELLER_REQUESTS_TASK_QUEUE}`);
    console.log('   - Workflows: requestNewProductWorkflow, requestSellerAccessWorkflow');
    console.log('');

    await startApiServer(appEffects);

    // Runs until the process is stopped
    await runWorker(appEffects);
  } catch (error) {
    console.error('❌ Failed to start storefront:', error);
    process.exit(1);
  }
}

function startApiServer(effects: ProductionEffects): Promise<void> {
  const app = createApp(createRoutes(effects, temporalSellerRequests));
  const port = Number(process.env.API_PORT || 3000);

  return new Promise((resolve) => {
    app.listen(port, () => {
      console.log(`🌐 API server started on port ${port}`);
      console.log(`   - Discounts: GET http://localhost:${port}/api/discounts?page=1`);
      console.log(`   - Store page: GET http://localhost:${port}/api/stores/:slug`);
      console.log(`   - Seller room: GET http://localhost:${port}/api/sellers-room`);
      console.log(`   - Health check: GET http://localhost:${port}/health`);
      console.log('');
      resolve();
    });
  });
}

async function shutdown(signal: string): Promise<void> {
  console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
  if (appEffects) {
    await appEffects.close();
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error) => {
    console.error('💥 Failed to shut down cleanly:', error);
    process.exit(1);
  });
});

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    console.error('💥 Failed to shut down cleanly:', error);
    process.exit(1);
  });
});

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
