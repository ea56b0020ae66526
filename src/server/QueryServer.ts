import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import {
  type MappingConfig,
  loadMappingConfig,
  loadMappingConfigFromEnv,
  resolveFieldMapping,
} from '../config/mappings.js';
import { OPERATOR_KINDS } from '../conditions/types.js';
import { logger } from '../utils/logger.js';
import { type McpContent, QueryController } from './QueryController.js';

const SERVER_NAME = 'query-string-toolkit';
const SERVER_VERSION = '0.1.0';

const conditionSchema = {
  type: 'object',
  properties: {
    type: {
      type: 'string',
      enum: ['item', 'group', 'nested'],
      description: 'Defaults to "item". Groups and nested conditions carry `children`.',
    },
    field: { type: 'string', description: 'Field name (display names are mapped).' },
    operator: {
      type: 'string',
      description: `One of ${OPERATOR_KINDS.join(', ')}, or an alias from the mapping config.`,
    },
    values: {
      type: 'array',
      items: { type: ['string', 'number', 'boolean'] },
    },
    groupRelation: {
      type: 'string',
      enum: ['AND', 'OR'],
      description: 'How multiple values combine (default OR).',
    },
    wildcard: {
      type: 'boolean',
      description: 'Values already contain * / ? wildcard markers.',
    },
    relation: { type: 'string', enum: ['AND', 'OR'] },
    path: { type: 'string', description: 'Nested document path (nested conditions only).' },
    children: { type: 'array', items: { type: 'object' } },
  },
} as const;

export function createQueryServer(config?: { mappings?: MappingConfig; mappingsPath?: string }): Server {
  const mappings =
    config?.mappings ??
    (config?.mappingsPath ? loadMappingConfig(config.mappingsPath) : loadMappingConfigFromEnv());

  logger.info('configuration-loaded', {
    fields: mappings.fields.length,
    fieldMappings: Object.keys(resolveFieldMapping(mappings)).length,
    translatedFields: Object.keys(mappings.valueTranslations).length,
    operatorAliases: Object.keys(mappings.operatorMapping).length,
  });

  const controller = new QueryController(mappings);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'transform_query_string',
          description:
            'Rewrite a Lucene-style query string: display field names become index field names and display values become canonical values. Grouping and boolean structure are preserved.',
          inputSchema: {
            type: 'object',
            properties: {
              query: {
                type: 'string',
                description: 'Query string to transform, e.g. "level: fatal AND state: open".',
              },
              quoteUntranslatedTerms: {
                type: 'boolean',
                description: 'Quote bare terms that match no value translation (exact phrase match).',
              },
            },
            required: ['query'],
          },
        },
        {
          name: 'build_query_string',
          description: 'Build a query string from a flat list of field/operator/values conditions.',
          inputSchema: {
            type: 'object',
            properties: {
              conditions: { type: 'array', items: conditionSchema },
              logicOperator: {
                type: 'string',
                enum: ['AND', 'OR'],
                description: 'Operator joining conditions (default AND).',
              },
            },
            required: ['conditions'],
          },
        },
        {
          name: 'build_search_body',
          description:
            'Build a search request body (query DSL) from conditions, an optional query string, ordering, pagination and aggregations.',
          inputSchema: {
            type: 'object',
            properties: {
              conditions: { type: 'array', items: conditionSchema },
              queryString: { type: 'string', description: 'Transformed and embedded as query_string.' },
              ordering: {
                type: 'array',
                items: { type: 'string' },
                description: 'Sort fields; prefix with "-" for descending.',
              },
              page: { type: 'number', description: 'Page number starting at 1 (default 1).' },
              pageSize: { type: 'number', description: 'Page size (default 10).' },
              aggregations: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    name: { type: 'string' },
                    type: { type: 'string', description: 'Aggregation type, e.g. terms or max.' },
                    field: { type: 'string' },
                    params: { type: 'object' },
                  },
                  required: ['name', 'type'],
                },
              },
            },
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const toolArgs = args ?? {};

    const timer = logger.startTimer('tool-call', { tool: name });
    logger.debug('server', 'request:start', {
      tool: name,
      argumentsSize: JSON.stringify(toolArgs).length,
    });

    let result: McpContent;
    switch (name) {
      case 'transform_query_string':
        result = controller.handleTransformTool(toolArgs);
        break;
      case 'build_query_string':
        result = controller.handleBuildQueryStringTool(toolArgs);
        break;
      case 'build_search_body':
        result = controller.handleBuildSearchBodyTool(toolArgs);
        break;
      default:
        logger.warn('Unknown tool requested', { tool: name });
        result = {
          content: [{ type: 'text', text: `Error: Unknown tool: ${name}` }],
          isError: true,
        };
    }

    timer.end({ status: result.isError ? 'error' : 'success' });
    return result;
  });

  return server;
}
