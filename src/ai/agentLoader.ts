import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AgentDefinitionError } from '../core/errors';
import { logDebug } from '../telemetry/logger';

export const agentRoleSchema = z.enum(['research', 'writing', 'review']);
export type AgentRole = z.infer<typeof agentRoleSchema>;

const frontmatterSchema = z.object({
    name: z.string().min(1),
    description: z.string().min(1),
    role: agentRoleSchema,
    tools: z.union([z.array(z.string()), z.string(), z.null()]).optional()
        .transform((value) => (value === null || value === undefined ? [] : Array.isArray(value) ? value : [value])),
    model: z.string().min(1),
    provider: z.string().min(1).transform((value) => value.toLowerCase()),
    temperature: z.coerce.number().min(0).max(2),
    max_iterations: z.coerce.number().int().min(1),
    color: z.string().optional(),
}).passthrough();

export interface AgentDefinition {
    name: string;
    description: string;
    role: AgentRole;
    /** Tool names the agent may call. Empty means every shared tool. */
    tools: string[];
    model: string;
    provider: string;
    temperature: number;
    maxIterations: number;
    instructions: string;
    filePath: string;
    color: string | null;
    metadata: Record<string, unknown>;
}

const FRONTMATTER_PATTERN = /^---\s*\r?\n([\s\S]*?)\r?\n---\s*(?:\r?\n([\s\S]*))?$/;

const KNOWN_KEYS = new Set(['name', 'description', 'role', 'tools', 'model', 'provider', 'temperature', 'max_iterations', 'color']);

function parseScalar(raw: string): unknown {
    const value = raw.trim();
    if (value === '' || value === '~' || value === 'null') return null;
    if (value === 'true') return true;
    if (value === 'false') return false;
    if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
        return value.slice(1, -1);
    }
    if (value.startsWith('[') && value.endsWith(']')) {
        const inner = value.slice(1, -1).trim();
        return inner ? inner.split(',').map((item) => parseScalar(item)) : [];
    }
    return value;
}

/**
 * Flat `key: value` frontmatter with inline `[a, b]` lists or `- item` blocks.
 * Nested mappings are not supported.
 */
export function parseFrontmatter(source: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    let listKey: string | null = null;
    for (const line of source.split(/\r?\n/)) {
        if (!line.trim() || line.trim().startsWith('#')) {
            continue;
        }
        const listItem = /^\s+-\s+(.*)$/.exec(line) ?? /^-\s+(.*)$/.exec(line);
        if (listItem && listKey) {
            const current = result[listKey];
            const items = Array.isArray(current) ? current : [];
            items.push(parseScalar(listItem[1]));
            result[listKey] = items;
            continue;
        }
        const pair = /^([A-Za-z_][\w-]*)\s*:\s*(.*)$/.exec(line);
        if (!pair) {
            throw new Error(`cannot parse frontmatter line "${line}"`);
        }
        const [, key, rawValue] = pair;
        if (rawValue.trim() === '') {
            result[key] = [];
            listKey = key;
        } else {
            result[key] = parseScalar(rawValue);
            listKey = null;
        }
    }
    return result;
}

export function parseAgentFile(content: string, filePath: string): AgentDefinition {
    const match = FRONTMATTER_PATTERN.exec(content);
    if (!match) {
        throw new AgentDefinitionError(`Agent file missing frontmatter: ${filePath}`, filePath);
    }

    let raw: Record<string, unknown>;
    try {
        raw = parseFrontmatter(match[1]);
    } catch (error) {
        throw new AgentDefinitionError(
            `Invalid frontmatter in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            filePath
        );
    }

    const parsed = frontmatterSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'frontmatter'}: ${issue.message}`);
        throw new AgentDefinitionError(`Invalid agent definition ${filePath}: ${issues.join('; ')}`, filePath);
    }

    const data = parsed.data;
    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (!KNOWN_KEYS.has(key)) {
            metadata[key] = value;
        }
    }

    return {
        name: data.name,
        description: data.description,
        role: data.role,
        tools: data.tools.map((tool) => tool.trim()).filter(Boolean),
        model: data.model,
        provider: data.provider,
        temperature: data.temperature,
        maxIterations: data.max_iterations,
        instructions: (match[2] ?? '').trim(),
        filePath,
        color: data.color ?? null,
        metadata,
    };
}

/**
 * Loads `<agentsDir>/<name>.md` definitions, caching each file once parsed.
 */
export class AgentLoader {
    private readonly agentsDir: string;
    private readonly cache = new Map<string, AgentDefinition>();

    constructor(agentsDir: string) {
        if (!fs.existsSync(agentsDir)) {
            throw new AgentDefinitionError(`Agents directory not found: ${agentsDir}`, agentsDir);
        }
        this.agentsDir = agentsDir;
    }

    async loadAgent(name: string): Promise<AgentDefinition> {
        const cached = this.cache.get(name);
        if (cached) {
            return cached;
        }
        const filePath = path.join(this.agentsDir, `${name}.md`);
        if (!fs.existsSync(filePath)) {
            throw new AgentDefinitionError(`Agent file not found: ${filePath}`, filePath);
        }
        const definition = parseAgentFile(await fs.promises.readFile(filePath, 'utf8'), filePath);
        this.cache.set(name, definition);
        await logDebug('agents.loaded', { name, role: definition.role, provider: definition.provider, model: definition.model });
        return definition;
    }

    async loadAll(): Promise<Map<string, AgentDefinition>> {
        const names = fs.readdirSync(this.agentsDir)
            .filter((file) => file.endsWith('.md'))
            .map((file) => path.basename(file, '.md'))
            .sort();
        const agents = new Map<string, AgentDefinition>();
        for (const name of names) {
            agents.set(name, await this.loadAgent(name));
        }
        return agents;
    }
}
