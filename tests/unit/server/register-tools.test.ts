/**
 * Unit tests for tool registration
 *
 * @module tests/unit/server/register-tools
 */

import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  allToolModules,
  getToolCount,
  registerAllTools,
} from '../../../src/server/register-tools.js';
import { successResult } from '../../../src/server/types.js';

const ALL_TOOL_NAMES = allToolModules.flatMap((toolModule) => Object.keys(toolModule));

describe('allToolModules', () => {
  it('holds 16 uniquely named tools', () => {
    expect(getToolCount()).toBe(16);
    expect(new Set(ALL_TOOL_NAMES).size).toBe(16);
  });

  it('prefixes every tool with boundary_', () => {
    for (const name of ALL_TOOL_NAMES) {
      expect(name).toMatch(/^boundary_[a-z_]+$/);
    }
  });

  it('tags every description with a category', () => {
    for (const toolModule of allToolModules) {
      for (const [name, tool] of Object.entries(toolModule)) {
        expect(tool.description, name).toMatch(/^\[[A-Z]+\] Use /);
      }
    }
  });
});

describe('registerAllTools', () => {
  it('registers every tool on a server instance', () => {
    const server = new McpServer({ name: 'registration-test', version: '0.0.0' });

    expect(registerAllTools(server)).toBe(16);
  });
});

describe('successResult', () => {
  it('wraps data without copying it', () => {
    const data = { name: 'ALPHA' };
    const result = successResult(data);

    expect(result.success).toBe(true);
    expect(result.data).toBe(data);
  });
});
