/**
 * researchTools.ts — external lookups exposed to the letter-writing agents
 *
 * linkedin_profile / linkedin_profiles_batch go through the Bright Data dataset
 * API, web_search through Tavily. A tool is only registered when its key is set.
 * Connections are created once by the pool and shared by every agent run.
 */

import { fetchWithRetryPolicy } from '../core/integrationPolicy';
import { AgentTool, ToolSource } from '../ai/toolAgent';
import { logInfo } from '../telemetry/logger';

export interface ResearchToolSettings {
    brightDataApiToken: string;
    brightDataDatasetId: string;
    tavilyApiKey: string;
    profileTimeoutMs: number;
    batchTimeoutMs: number;
    searchTimeoutMs: number;
    maxResultChars: number;
}

const BRIGHT_DATA_SCRAPE_URL = 'https://api.brightdata.com/datasets/v3/scrape';
const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

function truncate(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}\n[truncated]` : text;
}

function readString(args: Record<string, unknown>, key: string): string {
    const value = args[key];
    if (typeof value !== 'string' || !value.trim()) {
        throw new Error(`argument "${key}" must be a non-empty string`);
    }
    return value.trim();
}

function readStringList(args: Record<string, unknown>, key: string): string[] {
    const value = args[key];
    if (!Array.isArray(value)) {
        throw new Error(`argument "${key}" must be an array of strings`);
    }
    const list = value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
    if (list.length === 0) {
        throw new Error(`argument "${key}" must contain at least one URL`);
    }
    return list.map((item) => item.trim());
}

async function readBody(response: Response, integration: string): Promise<string> {
    const text = await response.text();
    if (!response.ok) {
        throw new Error(`${integration} HTTP ${response.status}: ${text.slice(0, 300)}`);
    }
    return text;
}

function brightDataScrape(settings: ResearchToolSettings, urls: string[], timeoutMs: number, integration: string): Promise<string> {
    const query = new URLSearchParams({ dataset_id: settings.brightDataDatasetId, format: 'json' });
    return fetchWithRetryPolicy(
        `${BRIGHT_DATA_SCRAPE_URL}?${query.toString()}`,
        {
            method: 'POST',
            headers: {
                'content-type': 'application/json',
                authorization: `Bearer ${settings.brightDataApiToken}`,
            },
            body: JSON.stringify(urls.map((url) => ({ url }))),
        },
        { integration, timeoutMs, maxAttempts: 2 }
    ).then((response) => readBody(response, integration));
}

function createProfileTool(settings: ResearchToolSettings): AgentTool {
    return {
        definition: {
            name: 'linkedin_profile',
            description: 'Fetch a public LinkedIn profile (experience, about, recent posts) by profile URL.',
            parameters: {
                type: 'object',
                properties: { url: { type: 'string', description: 'LinkedIn profile URL' } },
                required: ['url'],
            },
        },
        invoke: async (args) => {
            const text = await brightDataScrape(settings, [readString(args, 'url')], settings.profileTimeoutMs, 'brightdata.profile');
            return truncate(text, settings.maxResultChars);
        },
    };
}

function createProfilesBatchTool(settings: ResearchToolSettings): AgentTool {
    return {
        definition: {
            name: 'linkedin_profiles_batch',
            description: 'Fetch several LinkedIn profiles in one call. Slower; use only for more than one URL.',
            parameters: {
                type: 'object',
                properties: { urls: { type: 'array', items: { type: 'string' } } },
                required: ['urls'],
            },
        },
        invoke: async (args) => {
            const text = await brightDataScrape(settings, readStringList(args, 'urls'), settings.batchTimeoutMs, 'brightdata.batch');
            return truncate(text, settings.maxResultChars);
        },
    };
}

function createWebSearchTool(settings: ResearchToolSettings): AgentTool {
    return {
        definition: {
            name: 'web_search',
            description: 'Search the web for company news, funding, hiring and public activity.',
            parameters: {
                type: 'object',
                properties: {
                    query: { type: 'string' },
                    max_results: { type: 'integer', minimum: 1, maximum: 10 },
                },
                required: ['query'],
            },
        },
        invoke: async (args) => {
            const maxResults = typeof args.max_results === 'number' ? Math.min(10, Math.max(1, Math.floor(args.max_results))) : 5;
            const response = await fetchWithRetryPolicy(
                TAVILY_SEARCH_URL,
                {
                    method: 'POST',
                    headers: {
                        'content-type': 'application/json',
                        authorization: `Bearer ${settings.tavilyApiKey}`,
                    },
                    body: JSON.stringify({ query: readString(args, 'query'), max_results: maxResults }),
                },
                { integration: 'tavily.search', timeoutMs: settings.searchTimeoutMs }
            );
            return truncate(await readBody(response, 'tavily.search'), settings.maxResultChars);
        },
    };
}

export class ResearchToolRegistry implements ToolSource {
    private readonly settings: ResearchToolSettings;
    private tools: AgentTool[] = [];
    private initialized = false;

    constructor(settings: ResearchToolSettings) {
        this.settings = settings;
    }

    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }
        const tools: AgentTool[] = [];
        if (this.settings.brightDataApiToken && this.settings.brightDataDatasetId) {
            tools.push(createProfileTool(this.settings), createProfilesBatchTool(this.settings));
        }
        if (this.settings.tavilyApiKey) {
            tools.push(createWebSearchTool(this.settings));
        }
        this.tools = tools;
        this.initialized = true;
        await logInfo('tools.ready', { tools: tools.map((tool) => tool.definition.name) });
    }

    list(): AgentTool[] {
        return [...this.tools];
    }

    async close(): Promise<void> {
        this.tools = [];
        this.initialized = false;
    }
}
