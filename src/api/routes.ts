import type { FastifyInstance, FastifyReply } from 'fastify';
import { OrderedIndexService, BatchInsertError } from '../services/ordered-index-service.js';
import { isTreeError, type TreeErrorCode } from '../core/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';

interface InsertBody {
  value: number | null;
}

interface BatchInsertBody {
  values: number[];
}

interface ValueParams {
  value: number;
}

export interface RouteOptions {
  rateLimitMax?: number;  // Per second, per client, on mutating routes
}

const STATUS_BY_CODE: Record<TreeErrorCode, number> = {
  NULL_VALUE: 400,
  DUPLICATE_VALUE: 409,
  INVALID_RELATIONSHIP: 500,
  INVARIANT_VIOLATION: 500
};

function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (isTreeError(error)) {
    return reply.code(STATUS_BY_CODE[error.code]).send({ error: error.message, code: error.code });
  }
  return reply.code(500).send({ error: getErrorMessage(error) });
}

export function registerRoutes(fastify: FastifyInstance, service: OrderedIndexService, options: RouteOptions = {}): void {
  const mutationRateLimit = {
    max: options.rateLimitMax ?? 100,
    timeWindow: 1_000
  };

  // Schema definitions for OpenAPI
  const errorSchema = {
    type: 'object',
    properties: {
      error: { type: 'string', description: 'Error message' },
      code: { type: 'string', description: 'Tree error code, when the tree rejected the call' }
    }
  };

  const nodeRecordSchema = {
    type: 'object',
    properties: {
      value: { type: 'number', description: 'Stored value' },
      color: { type: 'string', enum: ['RED', 'BLACK'], description: 'Node color' }
    }
  };

  const valueParamsSchema = {
    type: 'object',
    required: ['value'],
    properties: {
      value: { type: 'number', description: 'Value to look up' }
    }
  };

  fastify.get('/api/health', {
    schema: {
      tags: ['System'],
      summary: 'Health check',
      description: 'Check system health status',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['ok'], description: 'Health status' },
            timestamp: { type: 'number', description: 'Check timestamp' },
            service: { type: 'string', description: 'Service name' },
            version: { type: 'string', description: 'Service version' }
          }
        }
      }
    }
  }, async (_request, reply) => {
    return reply.status(200).send({
      status: 'ok',
      timestamp: Date.now(),
      service: 'ordered-index',
      version: '1.0.0'
    });
  });

  fastify.get('/api/index', {
    schema: {
      tags: ['Index'],
      summary: 'Get index state',
      description: 'Size, height, level-order rendering, ascending values and the colored tree',
      response: {
        200: {
          type: 'object',
          properties: {
            size: { type: 'integer' },
            height: { type: 'integer' },
            blackHeight: { type: 'integer' },
            min: { type: 'number', nullable: true },
            max: { type: 'number', nullable: true },
            levelOrder: { type: 'string', description: 'Breadth-first rendering, e.g. [5, 3, 8]' },
            inOrder: { type: 'array', items: { type: 'number' } },
            tree: { type: 'object', nullable: true, additionalProperties: true }
          }
        }
      }
    }
  }, async (_request, reply) => {
    return reply.send(service.getState());
  });

  fastify.get<{ Params: ValueParams }>('/api/index/values/:value', {
    schema: {
      tags: ['Index'],
      summary: 'Search for a value',
      params: valueParamsSchema,
      response: {
        200: nodeRecordSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const found = service.search(request.params.value);
    if (!found) {
      return reply.code(404).send({ error: `Value ${request.params.value} not found` });
    }
    return reply.send(found);
  });

  fastify.post<{ Body: InsertBody }>('/api/index/values', {
    config: { rateLimit: mutationRateLimit },
    schema: {
      tags: ['Index'],
      summary: 'Insert a value',
      description: 'Adds a distinct value; duplicates are rejected with 409',
      body: {
        type: 'object',
        required: ['value'],
        properties: {
          value: { type: 'number', nullable: true, description: 'Value to insert' }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            value: { type: 'number' },
            size: { type: 'integer' }
          }
        },
        400: errorSchema,
        409: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      const change = service.insert(request.body.value);
      return reply.code(201).send({ value: change.value, size: change.size });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Body: BatchInsertBody }>('/api/index/values/batch', {
    config: { rateLimit: mutationRateLimit },
    schema: {
      tags: ['Index'],
      summary: 'Insert several values',
      description: 'Inserts in order and stops at the first rejected value',
      body: {
        type: 'object',
        required: ['values'],
        properties: {
          values: { type: 'array', items: { type: 'number' }, maxItems: 10_000 }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            inserted: { type: 'array', items: { type: 'number' } },
            size: { type: 'integer' }
          }
        },
        409: {
          type: 'object',
          properties: {
            error: { type: 'string' },
            code: { type: 'string' },
            inserted: { type: 'array', items: { type: 'number' } }
          }
        }
      }
    }
  }, async (request, reply) => {
    try {
      return reply.code(201).send(service.insertMany(request.body.values));
    } catch (error) {
      if (error instanceof BatchInsertError && isTreeError(error.cause)) {
        return reply.code(STATUS_BY_CODE[error.cause.code]).send({
          error: error.message,
          code: error.cause.code,
          inserted: error.inserted
        });
      }
      return sendError(reply, error);
    }
  });

  fastify.delete<{ Params: ValueParams }>('/api/index/values/:value', {
    config: { rateLimit: mutationRateLimit },
    schema: {
      tags: ['Index'],
      summary: 'Remove a value',
      params: valueParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            removed: nodeRecordSchema,
            size: { type: 'integer' }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const removed = service.remove(request.params.value);
    if (!removed) {
      return reply.code(404).send({ error: `Value ${request.params.value} not found` });
    }
    return reply.send({ removed, size: service.getSize() });
  });

  fastify.post('/api/index/validate', {
    schema: {
      tags: ['Index'],
      summary: 'Check red-black invariants',
      response: {
        200: {
          type: 'object',
          properties: {
            valid: { type: 'boolean' },
            blackHeight: { type: 'integer' }
          }
        },
        500: errorSchema
      }
    }
  }, async (_request, reply) => {
    try {
      return reply.send({ valid: true, blackHeight: service.validate() });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.delete('/api/index', {
    config: { rateLimit: mutationRateLimit },
    schema: {
      tags: ['Index'],
      summary: 'Remove every value',
      response: {
        200: {
          type: 'object',
          properties: {
            size: { type: 'integer' }
          }
        }
      }
    }
  }, async (_request, reply) => {
    service.clear();
    return reply.send({ size: service.getSize() });
  });
}
