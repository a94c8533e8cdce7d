#!/usr/bin/env node
/**
 * Inbox Assistant MCP Server
 * Main entry point for the Model Context Protocol server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { getConfig } from './utils/config.js';
import {
  connectProviders,
  createLogger,
  createProviders,
  disconnectProviders,
} from './providers/index.js';
import type { Providers } from './providers/index.js';
import { BusinessHoursPolicy } from './scheduling/index.js';
import { InboxService, SchedulingService } from './services/index.js';
import { createToolHandlers, toToolError, toolDefinitions } from './tools/index.js';

const LOG_PREFIX = '[inbox-assistant]';

/**
 * Create and configure the MCP server
 */
async function createServer(): Promise<{ server: Server; providers: Providers }> {
  const config = getConfig();
  const logger = createLogger(config.server.logLevel);

  // Validates working hours and timezone before any provider is touched
  const policy = new BusinessHoursPolicy(config.scheduling.workingHours, config.scheduling.timezone);

  const providers = createProviders(config, logger);
  await connectProviders(providers, logger);

  const scheduling = new SchedulingService(
    providers.calendar,
    policy,
    config.scheduling.resolver,
    logger
  );
  const inbox = new InboxService(
    providers.mail,
    providers.classifier,
    scheduling,
    {
      maxUnread: config.inbox.maxUnread,
      dryRun: config.inbox.dryRun,
      defaultMeetingTime: config.scheduling.defaultMeetingTime,
    },
    logger
  );

  const toolHandlers = createToolHandlers(scheduling, inbox);

  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool list handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: toolDefinitions.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = toolHandlers[name];
    if (!handler) {
      return {
        content: [
          {
            type: 'text',
            text: `Unknown tool: ${name}. Available tools: ${Object.keys(toolHandlers).join(', ')}`,
          },
        ],
        isError: true,
      };
    }

    try {
      return await handler(args ?? {});
    } catch (error) {
      console.error(`${LOG_PREFIX} Error executing tool ${name}:`, error);
      return toToolError(error);
    }
  });

  return { server, providers };
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  console.error(`${LOG_PREFIX} Starting inbox assistant MCP server...`);

  const { server, providers } = await createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  console.error(`${LOG_PREFIX} Server running on stdio transport`);

  // Handle graceful shutdown
  const shutdown = (): void => {
    console.error(`${LOG_PREFIX} Shutting down...`);
    const logger = createLogger(getConfig().server.logLevel);
    void disconnectProviders(providers, logger)
      .then(() => server.close())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(`${LOG_PREFIX} Error during shutdown:`, error);
          process.exit(1);
        }
      );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Run the server
main().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} Failed to start server:`, error);
  process.exit(1);
});
