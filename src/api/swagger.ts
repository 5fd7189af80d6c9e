import type { OpenAPIV3 } from 'openapi-types';

const amount: OpenAPIV3.SchemaObject = {
  type: 'string',
  nullable: true,
  description: 'Integer amount in the smallest unit, as a decimal string'
};

const apy: OpenAPIV3.SchemaObject = {
  type: 'string',
  nullable: true,
  description: 'Annualized percentage with two decimals'
};

const paginationParameters: OpenAPIV3.ParameterObject[] = [
  {
    name: 'limit',
    in: 'query',
    description: 'Maximum number of items, ignored when batch is present',
    schema: { type: 'integer', minimum: 1 }
  },
  {
    name: 'batch',
    in: 'query',
    description: 'Zero-based batch index',
    schema: { type: 'integer', minimum: 0 }
  },
  {
    name: 'batch_size',
    in: 'query',
    description: 'Items per batch',
    schema: { type: 'integer', minimum: 1, default: 32 }
  }
];

const sortOrderParameter: OpenAPIV3.ParameterObject = {
  name: 'sort_order',
  in: 'query',
  schema: { type: 'string', enum: ['asc', 'desc'], default: 'desc' }
};

const hotkeyParameter: OpenAPIV3.ParameterObject = {
  name: 'hotkey',
  in: 'path',
  required: true,
  schema: { type: 'string' }
};

function jsonResponse(description: string, schema: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject): OpenAPIV3.ResponseObject {
  return {
    description,
    content: { 'application/json': { schema } }
  };
}

export const swaggerDocument: OpenAPIV3.Document = {
  openapi: '3.0.0',
  info: {
    title: 'Subnet Yield Indexer API',
    version: '1.0.0',
    description: 'Stake, yield and APY figures for validators across every subnet'
  },
  servers: [
    {
      url: 'http://localhost:3000/api',
      description: 'Local development server'
    }
  ],
  paths: {
    '/health': {
      get: {
        tags: ['Health'],
        summary: 'Liveness check',
        responses: {
          '200': jsonResponse('Service is up', {
            type: 'object',
            properties: {
              status: { type: 'string', example: 'healthy' },
              timestamp: { type: 'string', format: 'date-time' }
            }
          })
        }
      }
    },
    '/validators': {
      get: {
        tags: ['Validators'],
        summary: 'List validators with aggregated yield',
        parameters: [
          {
            name: 'sort_by',
            in: 'query',
            schema: { type: 'string', enum: ['total_stake', 'subnet_stake'], default: 'total_stake' }
          },
          sortOrderParameter,
          {
            name: 'subnet_id',
            in: 'query',
            description: 'Only validators with stake in this subnet; required with sort_by=subnet_stake',
            schema: { type: 'integer', minimum: 0 }
          },
          ...paginationParameters
        ],
        responses: {
          '200': jsonResponse('Validator page', {
            type: 'object',
            properties: {
              data: { type: 'array', items: { $ref: '#/components/schemas/ValidatorListItem' } },
              pagination: { $ref: '#/components/schemas/Pagination' }
            }
          }),
          '400': { $ref: '#/components/responses/Error400' },
          '500': { $ref: '#/components/responses/Error500' }
        }
      }
    },
    '/validators/subnet/{subnetId}': {
      get: {
        tags: ['Validators'],
        summary: 'List validators staked in one subnet, ranked by subnet stake',
        parameters: [
          {
            name: 'subnetId',
            in: 'path',
            required: true,
            schema: { type: 'integer', minimum: 0 }
          },
          sortOrderParameter,
          ...paginationParameters
        ],
        responses: {
          '200': jsonResponse('Validator page', {
            type: 'object',
            properties: {
              data: { type: 'array', items: { $ref: '#/components/schemas/SubnetValidatorItem' } },
              pagination: { $ref: '#/components/schemas/Pagination' }
            }
          }),
          '400': { $ref: '#/components/responses/Error400' },
          '500': { $ref: '#/components/responses/Error500' }
        }
      }
    },
    '/validators/{hotkey}': {
      get: {
        tags: ['Validators'],
        summary: 'Stored yield for one validator',
        parameters: [hotkeyParameter],
        responses: {
          '200': jsonResponse('Validator', { $ref: '#/components/schemas/ValidatorListItem' }),
          '404': jsonResponse('Validator not found', {
            type: 'object',
            properties: { error: { type: 'string', example: 'Validator not found' } }
          }),
          '500': { $ref: '#/components/responses/Error500' }
        }
      }
    },
    '/validators/{hotkey}/live': {
      get: {
        tags: ['Validators'],
        summary: 'Compute yield for one validator directly from the chain',
        parameters: [hotkeyParameter],
        responses: {
          '200': jsonResponse('Live figures', { $ref: '#/components/schemas/LiveValidatorView' }),
          '503': { $ref: '#/components/responses/Error503' },
          '500': { $ref: '#/components/responses/Error500' }
        }
      }
    },
    '/subnets': {
      get: {
        tags: ['Subnets'],
        summary: 'Subnet names and symbols',
        responses: {
          '200': jsonResponse('Subnets', { type: 'array', items: { $ref: '#/components/schemas/SubnetInfo' } }),
          '500': { $ref: '#/components/responses/Error500' }
        }
      }
    },
    '/admin/subnets/{netuid}': {
      post: {
        tags: ['Subnets'],
        summary: 'Set the name and symbol of a subnet',
        security: [{ AdminKey: [] }],
        parameters: [
          {
            name: 'netuid',
            in: 'path',
            required: true,
            schema: { type: 'integer', minimum: 0 }
          }
        ],
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['name', 'symbol'],
                properties: {
                  name: { type: 'string' },
                  symbol: { type: 'string' }
                }
              }
            }
          }
        },
        responses: {
          '200': jsonResponse('Updated subnet', {
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              message: { type: 'string' },
              data: { $ref: '#/components/schemas/SubnetInfo' }
            }
          }),
          '400': { $ref: '#/components/responses/Error400' },
          '401': jsonResponse('Missing or wrong admin key', {
            type: 'object',
            properties: { error: { type: 'string', example: 'Unauthorized' } }
          })
        }
      }
    },
    '/trpc/{procedures}': {
      get: {
        tags: ['Batch'],
        summary: 'Run comma-separated procedures in one request',
        description: 'Known procedures: delegates.getDelegates4, subnets.getSubnetsNameAndSymbol',
        parameters: [
          {
            name: 'procedures',
            in: 'path',
            required: true,
            schema: { type: 'string', example: 'delegates.getDelegates4,subnets.getSubnetsNameAndSymbol' }
          },
          ...paginationParameters
        ],
        responses: {
          '200': jsonResponse('One entry per procedure, in request order', {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                result: {
                  type: 'object',
                  properties: { data: { type: 'object', properties: { json: {} } } }
                },
                error: {
                  type: 'object',
                  properties: { message: { type: 'string' } }
                }
              }
            }
          })
        }
      }
    }
  },
  components: {
    securitySchemes: {
      AdminKey: {
        type: 'apiKey',
        in: 'header',
        name: 'x-admin-key'
      }
    },
    schemas: {
      Pagination: {
        type: 'object',
        properties: {
          total: { type: 'integer' },
          batch_size: { type: 'integer', nullable: true },
          current_batch: { type: 'integer', nullable: true },
          total_batches: { type: 'integer', nullable: true }
        }
      },
      AggregatedFields: {
        type: 'object',
        properties: {
          latestStake: amount,
          stake1hAgo: amount,
          stake24hAgo: amount,
          stake7dAgo: amount,
          stake30dAgo: amount,
          hourlyYield: amount,
          dailyYield: amount,
          weeklyYield: amount,
          monthlyYield: amount,
          hourlyApy: apy,
          dailyApy: apy,
          weeklyApy: apy,
          monthlyApy: apy
        }
      },
      ValidatorListItem: {
        allOf: [
          { $ref: '#/components/schemas/AggregatedFields' },
          {
            type: 'object',
            properties: {
              hotkey: { type: 'string' },
              coldkey: { type: 'string' },
              name: { type: 'string' },
              description: { type: 'string' },
              take: { type: 'string' },
              verified: { type: 'boolean' },
              total_stake: { type: 'string' },
              last_updated: { type: 'string', format: 'date-time' },
              subnetsData: {
                type: 'object',
                additionalProperties: { $ref: '#/components/schemas/StoredSubnetYield' }
              }
            }
          }
        ]
      },
      SubnetValidatorItem: {
        allOf: [
          { $ref: '#/components/schemas/ValidatorListItem' },
          {
            type: 'object',
            properties: {
              subnet_stake: { type: 'string' },
              subnet_data: { $ref: '#/components/schemas/StoredSubnetYield' }
            }
          }
        ]
      },
      StoredSubnetYield: {
        type: 'object',
        properties: {
          latestStake: amount,
          lastStake: amount,
          stake1hAgo: amount,
          stake24hAgo: amount,
          stake7dAgo: amount,
          stake30dAgo: amount,
          hourlyYield: amount,
          dailyYield: amount,
          weeklyYield: amount,
          monthlyYield: amount,
          hourlyApy: apy,
          dailyApy: apy,
          weeklyApy: apy,
          monthlyApy: apy
        }
      },
      LiveValidatorView: {
        allOf: [
          { $ref: '#/components/schemas/AggregatedFields' },
          {
            type: 'object',
            properties: {
              hotkey: { type: 'string' },
              block: { type: 'integer' },
              timestamp: { type: 'integer' },
              total_stake: { type: 'string' },
              subnetCount: { type: 'integer' },
              subnetsData: {
                type: 'object',
                additionalProperties: { $ref: '#/components/schemas/StoredSubnetYield' }
              }
            }
          }
        ]
      },
      SubnetInfo: {
        type: 'object',
        properties: {
          netuid: { type: 'string' },
          name: { type: 'string' },
          symbol: { type: 'string' },
          last_updated: { type: 'string', format: 'date-time', nullable: true }
        }
      },
      Error: {
        type: 'object',
        properties: {
          status: { type: 'string' },
          error: { type: 'string' },
          message: { type: 'string' }
        }
      }
    },
    responses: {
      Error400: jsonResponse('Invalid query or body', { $ref: '#/components/schemas/Error' }),
      Error500: jsonResponse('Internal server error', { $ref: '#/components/schemas/Error' }),
      Error503: jsonResponse('Chain unavailable', { $ref: '#/components/schemas/Error' })
    }
  }
};
