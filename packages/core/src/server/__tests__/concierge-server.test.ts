import { describe, it, expect, beforeEach } from 'vitest';
import { ConciergeServer } from '../concierge-server.js';
import { InMemoryItemStore } from '../../storage/in-memory.js';
import { createSilentLogger } from '../../logging/logger.js';
import type { ConciergeConfig, ConciergeTool } from '../../types/public-api.js';
import { VERSION } from '../../version.js';

function createTestConfig(overrides?: Partial<ConciergeConfig>): ConciergeConfig {
  return {
    app: {
      name: 'Test App',
      description: 'A test application',
      version: '1.0.0',
    },
    mcp: {
      serverName: 'test-server',
      protocolVersion: '2024-11-05',
    },
    ...overrides,
  };
}

function createTool(name: string): ConciergeTool {
  return {
    name,
    description: `Tool ${name}`,
    inputSchema: { type: 'object', properties: {} },
    handler: async () => ({ content: [{ type: 'text', text: name }] }),
  };
}

function rpc(method: string, params?: unknown): Request {
  return new Request('http://localhost/mcp', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ jsonrpc: '2.0', id: 1, method, params }),
  });
}

describe('ConciergeServer', () => {
  let server: ConciergeServer;
  let store: InMemoryItemStore;
  let config: ConciergeConfig;

  beforeEach(() => {
    store = new InMemoryItemStore();
    config = createTestConfig();
    server = new ConciergeServer({ config, store, logger: createSilentLogger() });
  });

  describe('static properties', () => {
    it('should expose VERSION', () => {
      expect(ConciergeServer.VERSION).toBe(VERSION);
    });
  });

  describe('health endpoint', () => {
    it('should respond to /health', async () => {
      const response = await server.fetch(new Request('http://localhost/health'));

      expect(response.status).toBe(200);
      const body = await response.json();
      expect(body.status).toBe('ok');
      expect(body.version).toBe(VERSION);
      expect(typeof body.timestamp).toBe('string');
    });

    it('should not answer POST /health as health', async () => {
      const response = await server.fetch(
        new Request('http://localhost/health', { method: 'POST', body: 'x' })
      );
      expect(response.status).toBe(404);
    });
  });

  describe('CORS', () => {
    it('should answer preflight with wildcard by default', async () => {
      const response = await server.fetch(
        new Request('http://localhost/mcp', {
          method: 'OPTIONS',
          headers: { Origin: 'https://desk.example.com' },
        })
      );

      expect(response.status).toBe(204);
      expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
      expect(response.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
      expect(response.headers.get('Access-Control-Max-Age')).toBe('86400');
    });

    it('should echo an allowed origin', async () => {
      server = new ConciergeServer({
        config: createTestConfig({ cors: { origins: ['https://desk.example.com'] } }),
        store,
        logger: createSilentLogger(),
      });

      const response = await server.fetch(
        new Request('http://localhost/mcp', {
          method: 'OPTIONS',
          headers: { Origin: 'https://desk.example.com' },
        })
      );

      expect(response.status).toBe(204);
      expect(response.headers.get('Access-Control-Allow-Origin')).toBe('https://desk.example.com');
    });

    it('should reject an origin outside the allow list', async () => {
      server = new ConciergeServer({
        config: createTestConfig({ cors: { origins: ['https://desk.example.com'] } }),
        store,
        logger: createSilentLogger(),
      });

      const response = await server.fetch(
        new Request('http://localhost/mcp', {
          method: 'OPTIONS',
          headers: { Origin: 'https://other.example.com' },
        })
      );

      expect(response.status).toBe(403);
    });

    it('should reject a preflight without Origin when no wildcard is set', async () => {
      server = new ConciergeServer({
        config: createTestConfig({ cors: { origins: ['https://desk.example.com'] } }),
        store,
        logger: createSilentLogger(),
      });

      const response = await server.fetch(
        new Request('http://localhost/mcp', { method: 'OPTIONS' })
      );

      expect(response.status).toBe(403);
    });
  });

  describe('tool registration', () => {
    it('should register tools from options', () => {
      server = new ConciergeServer({
        config,
        store,
        logger: createSilentLogger(),
        tools: [createTool('a'), createTool('b')],
      });

      expect(server.getTools().map((t) => t.name)).toEqual(['a', 'b']);
    });

    it('should reject duplicate tool names', () => {
      server.registerTool(createTool('a'));
      expect(() => server.registerTool(createTool('a'))).toThrow('Tool already registered: a');
    });

    it('should serve tools registered after construction', async () => {
      server.registerTool(createTool('late'));

      const response = await server.fetch(rpc('tools/call', { name: 'late' }));
      const body = await response.json();

      expect(body.result.content).toEqual([{ type: 'text', text: 'late' }]);
    });
  });

  describe('MCP routing', () => {
    it('should handle initialize', async () => {
      const response = await server.fetch(
        rpc('initialize', {
          protocolVersion: '2024-11-05',
          capabilities: {},
          clientInfo: { name: 'client', version: '1.0.0' },
        })
      );
      const body = await response.json();

      expect(body.result.serverInfo).toEqual({ name: 'test-server', version: '1.0.0' });
      expect(body.result.capabilities).toEqual({ logging: {} });
    });

    it('should list tools', async () => {
      server.registerTool(createTool('a'));

      const body = await (await server.fetch(rpc('tools/list'))).json();

      expect(body.result.tools).toEqual([
        { name: 'a', description: 'Tool a', inputSchema: { type: 'object', properties: {} } },
      ]);
    });

    it('should not route POSTs without a JSON content type', async () => {
      const response = await server.fetch(
        new Request('http://localhost/mcp', {
          method: 'POST',
          headers: { 'Content-Type': 'text/plain' },
          body: '{}',
        })
      );

      expect(response.status).toBe(404);
    });

    it('should 404 unknown GETs', async () => {
      const response = await server.fetch(new Request('http://localhost/nope'));
      expect(response.status).toBe(404);
      expect(await response.text()).toBe('Not Found');
    });
  });

  describe('getters', () => {
    it('should return a frozen config copy', () => {
      const copy = server.getConfig();
      expect(copy).toEqual(config);
      expect(Object.isFrozen(copy)).toBe(true);
    });

    it('should return the store', () => {
      expect(server.getStore()).toBe(store);
    });
  });
});
