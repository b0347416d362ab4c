#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StructPatchServer } from './server.js';

async function run() {
    const patchServer = new StructPatchServer();
    process.on('SIGINT', () => {
        patchServer.close()
            .catch(error => console.error('[MCP Error]', error))
            .finally(() => process.exit(0));
    });

    const transport = new StdioServerTransport();
    await patchServer.server.connect(transport);
    console.error('Struct patch server started');
}

run().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
