import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { PatchError } from './errors.js';
import { patchFile } from './filePatcher.js';
import { ConstructRuleSchema, builtInRuleSetNames, parseRuleSet, resolveRuleSet } from './ruleSet.js';
import { ConstructRule } from './types.js';

export const SERVER_INFO = {
    name: 'struct-patch',
    version: '1.0.0'
};

const ApplyRuleSetArgsSchema = z.object({
    filePath: z.string().min(1),
    ruleSet: z.string().min(1).optional(),
    rules: z.array(ConstructRuleSchema).optional(),
    dryRun: z.boolean().optional(),
    createBackup: z.boolean().optional()
}).refine(args => args.ruleSet === undefined || args.rules === undefined, {
    message: 'Pass either ruleSet or rules, not both'
});

type ApplyRuleSetArgs = z.infer<typeof ApplyRuleSetArgsSchema>;

function textContent(value: unknown) {
    return [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }];
}

/**
 * Exposes the rewrite engine as MCP tools
 */
export class StructPatchServer {
    readonly server: Server;

    constructor() {
        this.server = new Server(SERVER_INFO, {
            capabilities: {
                tools: {}
            }
        });

        this.setupToolHandlers();
        this.server.onerror = (error: Error) => console.error('[MCP Error]', error);
    }

    private async rulesFor(args: ApplyRuleSetArgs): Promise<ConstructRule[]> {
        if (args.rules) {
            return parseRuleSet({ name: 'inline', rules: args.rules }, 'inline rules').rules;
        }
        const ruleSet = await resolveRuleSet(args.ruleSet ?? 'interceptors');
        return ruleSet.rules;
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: [
                {
                    name: 'list_rule_sets',
                    description: 'List the built-in rule sets and their rule ids',
                    inputSchema: {
                        type: 'object',
                        properties: {}
                    }
                },
                {
                    name: 'apply_rule_set',
                    description: 'Remove or rewrite the constructs a rule set describes in one file',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            filePath: {
                                type: 'string',
                                description: 'Path to the file to patch'
                            },
                            ruleSet: {
                                type: 'string',
                                description: 'Built-in rule set name or path to a rule set JSON file'
                            },
                            rules: {
                                type: 'array',
                                description: 'Inline rules, used instead of ruleSet',
                                items: { type: 'object' }
                            },
                            dryRun: {
                                type: 'boolean',
                                description: 'Return a unified diff without writing'
                            },
                            createBackup: {
                                type: 'boolean',
                                description: 'Copy the original to <file>.bak first'
                            }
                        },
                        required: ['filePath']
                    }
                }
            ]
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async request => {
            switch (request.params.name) {
                case 'list_rule_sets': {
                    const ruleSets = await Promise.all(builtInRuleSetNames().map(resolveRuleSet));
                    return {
                        content: textContent(ruleSets.map(ruleSet => ({
                            name: ruleSet.name,
                            description: ruleSet.description,
                            ruleIds: ruleSet.rules.map(rule => rule.id)
                        })))
                    };
                }
                case 'apply_rule_set': {
                    const parsed = ApplyRuleSetArgsSchema.safeParse(request.params.arguments ?? {});
                    if (!parsed.success) {
                        throw new McpError(
                            ErrorCode.InvalidParams,
                            parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
                        );
                    }

                    const args = parsed.data;
                    try {
                        const report = await patchFile(args.filePath, await this.rulesFor(args), {
                            dryRun: args.dryRun,
                            createBackup: args.createBackup
                        });
                        return { content: textContent({ success: true, ...report }) };
                    } catch (error) {
                        if (!(error instanceof PatchError)) {
                            throw error;
                        }
                        return {
                            content: textContent({ success: false, code: error.code, error: error.message }),
                            isError: true
                        };
                    }
                }
                default:
                    throw new McpError(
                        ErrorCode.MethodNotFound,
                        `Unknown tool: ${request.params.name}`
                    );
            }
        });
    }

    async close(): Promise<void> {
        await this.server.close();
    }
}
