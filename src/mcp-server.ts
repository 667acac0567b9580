#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for filing-metrics.
 *
 * Tools:
 *   - analyze_company: normalized metrics, growth and data quality for one company
 *   - normalize_ticker: validate and normalize a ticker symbol
 *   - list_metrics: list all supported metrics
 *
 * Resources:
 *   - filing-metrics://metrics: full metric definitions
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { METRICS } from './core/types.js';
import { METRIC_DEFINITIONS } from './processing/metric-definitions.js';
import { getConfig } from './core/config.js';
import { setLogLevel } from './core/logger.js';
import { analyzeCompanyTool, listMetricsTool, normalizeTickerTool } from './mcp/tools.js';

// stdout carries the protocol; logs go to stderr
setLogLevel(getConfig().logLevel);

const server = new McpServer(
  { name: 'filing-metrics', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {} } }
);

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'analyze_company',
  'Normalized financial metrics for a public company from SEC XBRL filings: annual and quarterly series with filing provenance, YoY/QoQ/CAGR growth (rates as fractions, with caveats where a rate is not meaningful) and a data-quality report.',
  {
    ticker: z.string().describe('Ticker symbol (e.g., AAPL, BRK.B)'),
    metrics: z.array(z.enum(METRICS)).optional().describe('Metrics to analyze (default: all)'),
    years: z.number().int().min(1).max(30).optional().describe('Trailing fiscal years (default 5)'),
    cagr_years: z.number().int().min(2).optional().describe('Rolling CAGR window in years (default: full span)'),
  },
  async (args) => analyzeCompanyTool(args)
);

server.tool(
  'normalize_ticker',
  'Validate and normalize a ticker symbol (share-class dots, renamed tickers) without fetching data.',
  {
    ticker: z.string().describe('Ticker symbol as entered'),
  },
  async (args) => normalizeTickerTool(args)
);

server.tool(
  'list_metrics',
  'List all supported financial metrics.',
  {},
  async () => listMetricsTool()
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'metric-definitions',
  'filing-metrics://metrics',
  { description: 'Metric definitions with their XBRL concept synonyms', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(METRIC_DEFINITIONS, null, 2),
    }],
  })
);

// ── Start Server ───────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
