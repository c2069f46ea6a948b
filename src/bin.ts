#!/usr/bin/env node
/**
 * Boundary Extractor MCP Server - CLI Entry Point
 *
 * Usage:
 *   boundary-extractor-mcp              # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
