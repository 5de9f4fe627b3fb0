/**
 * TEMPORAL CLIENT
 *
 * Starts seller request workflows on behalf of the HTTP API. The client only
 * submits work; the worker in worker.ts executes it.
 */

import {Client, Connection, WorkflowExecutionAlreadyStartedError} from '@temporalio/client';
import {Either, Left, Right} from 'purify-ts';
import {ProductRequestInput, StorefrontError} from '../pure/types';
import {productRequestWorkflowId, sellerAccessWorkflowId, storefrontError} from '../pure/businessLogic';
import {SellerRequestGateway, StartedRequest} from '../api/routes';
import type {requestNewProductWorkflow, requestSellerAccessWorkflow} from './sellerRequests.workflow';

export const SELLER_REQUESTS_TASK_QUEUE = 'seller-requests';

let client: Client | null = null;

/**
 * Get or create a Temporal client
 *
 * The client is lightweight and can be reused across requests
 */
export async function getTemporalClient(): Promise<Client> {
  if (!client) {
    const connection = await Connection.connect({
      address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
    });

    client = new Client({
      connection,
      namespace: process.env.TEMPORAL_NAMESPACE || 'default',
    });
  }

  return client;
}

// Same id twice means the same request twice: report it instead of starting again
async function startOnce(
  workflowId: string,
  start: (temporalClient: Client) => Promise<{ workflowId: string; firstExecutionRunId: string }>
): Promise<Either<StorefrontError, StartedRequest>> {
  const temporalClient = await getTemporalClient();
  try {
    const handle = await start(temporalClient);
    return Right({workflowId: handle.workflowId, runId: handle.firstExecutionRunId});
  } catch (error) {
    if (error instanceof WorkflowExecutionAlreadyStartedError) {
      return Left(storefrontError('Conflict', `Request ${workflowId} is already being processed`));
    }
    throw error;
  }
}

export const temporalSellerRequests: SellerRequestGateway = {
  startProductRequest(userId: string, input: ProductRequestInput) {
    const workflowId = productRequestWorkflowId(userId, input);
    return startOnce(workflowId, temporalClient => temporalClient.workflow.start<typeof requestNewProductWorkflow>('requestNewProductWorkflow', {
      workflowId,
      taskQueue: SELLER_REQUESTS_TASK_QUEUE,
      args: [userId, input],
    }));
  },

  startSellerAccessRequest(userId: string) {
    const workflowId = sellerAccessWorkflowId(userId);
    return startOnce(workflowId, temporalClient => temporalClient.workflow.start<typeof requestSellerAccessWorkflow>('requestSellerAccessWorkflow', {
      workflowId,
      taskQueue: SELLER_REQUESTS_TASK_QUEUE,
      args: [userId],
    }));
  },
};
