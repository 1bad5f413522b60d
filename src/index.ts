#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { InMemoryTaskBroker } from './broker.js';
import { loadConfig } from './config.js';
import { JobStore } from './jobs.js';
import { createLogger } from './logger.js';
import { createRoles } from './roles.js';
import { ResultStore } from './storage/result-store.js';
import { registerResearchTools, startJanitor, ToolServices } from './tools.js';
import { ResearchResultData } from './types/tasks.js';
import { AgentWorker } from './worker.js';

const log = createLogger('Research MCP');

// Create the MCP server
const server = new McpServer({
  name: 'iterative-research-mcp',
  version: '1.0.0',
});

// Start the server
async function main() {
  log.info('Starting server...');

  // Note: process.env is populated by the MCP host at runtime from mcp.json
  const config = loadConfig(process.env);
  log.info(`Finder: ${config.finder.provider}/${config.finder.model}, Critic: ${config.critic.provider}/${config.critic.model}`);

  const broker = new InMemoryTaskBroker();
  const resultStore = new ResultStore<ResearchResultData>(config.resultTtlMs);
  const worker = new AgentWorker({
    broker,
    createRoles: onUsage => createRoles(config, onUsage),
    settings: { maxIterations: config.maxIterations, qualityThreshold: config.qualityThreshold },
    resultStore,
    resultInlineLimitBytes: config.resultInlineLimitBytes,
  });
  const services: ToolServices = { broker, jobs: new JobStore(), worker, resultStore };

  const stopWorker = worker.start();
  const stopJanitor = startJanitor(services, config.resultTtlMs);
  registerResearchTools(server, services);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info('Server ready on stdio');
  log.info('Available tools: start_research, check_research_status, cancel_research');

  const shutdown = async () => {
    log.info('Shutting down...');
    stopJanitor();
    stopWorker();
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
