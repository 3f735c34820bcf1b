import assert from 'node:assert/strict';
import { before, describe, test } from 'node:test';
import { AgentDefinition, AgentRole } from '../ai/agentLoader';
import { AgentDefinitionSource, AgentTeam, writingAngle } from '../ai/agentTeam';
import { ChatClient } from '../ai/openaiClient';
import { LeadProfile } from '../types/domain';
import { FakeToolSource, makeTool, ScriptedChatClient, ScriptedReply, silenceLogs, TEST_CONTEXT, textReply } from './helpers';

const LEAD: LeadProfile = {
    email: 'jane@example.test',
    name: 'Jane Doe',
    firstName: 'Jane',
    lastName: 'Doe',
    company: 'Acme',
    jobTitle: 'Head of Operations',
    linkedinUrl: 'https://www.linkedin.com/in/jane-doe/',
};

function definition(name: string, role: AgentRole, tools: string[]): AgentDefinition {
    return {
        name,
        description: name,
        role,
        tools,
        model: 'fake-model',
        provider: 'fake',
        temperature: 0.2,
        maxIterations: 3,
        instructions: `You are the ${name}.`,
        filePath: `${name}.md`,
        color: null,
        metadata: {},
    };
}

const AGENTS: AgentDefinitionSource = {
    loadAgent: async (name) => {
        if (name === 'researcher') return definition('researcher', 'research', ['web_search']);
        if (name === 'writer') return definition('writer', 'writing', ['web_search']);
        return definition('reviewer', 'review', []);
    },
};

const RESEARCH = JSON.stringify({
    rejected: false,
    relevance_assessment: 'HIGH',
    insights: { primary_insight: 'Opened a Berlin warehouse', secondary_insight: 'Hiring demand planners' },
});

function letterJson(subject: string, signals: string[], extra: Record<string, unknown> = {}): string {
    return JSON.stringify({
        rejected: false,
        letter: { subject, body: `Body for ${subject}`, send_time: 'Tue 10:00', personalization_signals: signals },
        relevance_assessment: 'MEDIUM',
        notes: `notes ${subject}`,
        ...extra,
    });
}

interface Scripts {
    researcher: ScriptedReply[];
    writer: ScriptedReply[];
    reviewer: ScriptedReply[];
}

function buildTeam(scripts: Scripts, counts: { researchAgents?: number; writerAgents?: number } = {}) {
    const clients: Record<keyof Scripts, ScriptedChatClient> = {
        researcher: new ScriptedChatClient(scripts.researcher),
        writer: new ScriptedChatClient(scripts.writer),
        reviewer: new ScriptedChatClient(scripts.reviewer),
    };
    const clientFor = (def: AgentDefinition): ChatClient => {
        if (def.name === 'researcher' || def.name === 'writer' || def.name === 'reviewer') {
            return clients[def.name];
        }
        throw new Error(`unexpected agent ${def.name}`);
    };
    const tools = new FakeToolSource([
        makeTool('web_search', async () => 'result'),
        makeTool('linkedin_profile', async () => 'profile'),
    ]);
    const team = new AgentTeam({
        agents: AGENTS,
        clientFor,
        tools,
        researchAgents: counts.researchAgents ?? 1,
        writerAgents: counts.writerAgents ?? 2,
        parallel: false,
    });
    return { team, clients };
}

describe('AgentTeam', () => {
    before(() => silenceLogs());

    test('research, two writer variants and a review produce the selected letter', async () => {
        const { team, clients } = buildTeam({
            researcher: [textReply(RESEARCH, 100, 20)],
            writer: [
                textReply(letterJson('First', ['Opened a Berlin warehouse in March 2024']), 50, 30),
                textReply(letterJson('Second', ['Hiring three demand planners']), 50, 30),
            ],
            reviewer: [textReply('{"selected_variant": 2, "selection_reasoning": "sharper hook", "confidence": "HIGH"}', 40, 10)],
        });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);

        assert.deepEqual(outcome.result, {
            variant: 'accepted',
            letter: {
                subject: 'Second',
                body: 'Body for Second',
                sendTime: 'Tue 10:00',
                personalizationSignals: ['Hiring three demand planners'],
            },
            relevanceAssessment: 'MEDIUM',
            notes: 'Selected variant 2 of 2 (confidence HIGH): sharper hook',
        });
        assert.deepEqual(outcome.usage, { inputTokens: 240, outputTokens: 90, cachedTokens: 0 });

        const researchPrompt = clients.researcher.requests[0].messages[0].content;
        assert.ok(researchPrompt.includes('- **Email**: jane@example.test'));
        assert.ok(!researchPrompt.includes('PROJECT CONTEXT'));
        assert.ok(!researchPrompt.includes('PRIORITY FOCUS'));
        assert.deepEqual(clients.researcher.requests[0].tools?.map((tool) => tool.name), ['web_search']);

        assert.ok(clients.writer.requests[0].messages[0].content.includes('SUGGESTED ANGLE: Lead with primary insight: Opened a Berlin warehouse...'));
        assert.ok(clients.writer.requests[1].messages[0].content.includes('SUGGESTED ANGLE: Lead with secondary insight: Hiring demand planners...'));
        assert.ok(clients.reviewer.requests[0].messages[0].content.includes('PROJECT CONTEXT'));
        assert.deepEqual(clients.reviewer.requests[0].tools?.map((tool) => tool.name), ['web_search', 'linkedin_profile']);
    });

    test('a single researcher rejection ends the workflow with its reason', async () => {
        const { team, clients } = buildTeam({
            researcher: [textReply('{"rejected": true, "rejection_reason": "Company shut down"}')],
            writer: [],
            reviewer: [],
        });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.deepEqual(outcome.result, {
            variant: 'rejected',
            reason: 'Company shut down',
            relevanceAssessment: 'LOW',
            notes: 'Company shut down',
        });
        assert.equal(clients.writer.calls, 0);
    });

    test('several researchers get distinct focuses and a generic reason when none succeed', async () => {
        const { team, clients } = buildTeam({
            researcher: [new Error('search quota'), textReply('{"rejected": true, "reason": "Wrong industry"}')],
            writer: [],
            reviewer: [],
        }, { researchAgents: 2 });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.deepEqual(outcome.result, {
            variant: 'rejected',
            reason: 'All research agents failed or rejected lead',
            relevanceAssessment: 'LOW',
            notes: 'search quota | Wrong industry',
        });
        assert.ok(clients.researcher.requests[0].messages[0].content.includes('PRIORITY FOCUS: LinkedIn profile and recent personal activity'));
        assert.ok(clients.researcher.requests[1].messages[0].content.includes('PRIORITY FOCUS: Company news, funding, and growth signals'));
    });

    test('a researcher whose model call fails rejects the lead with the failure', async () => {
        const { team, clients } = buildTeam({ researcher: [new Error('provider down')], writer: [], reviewer: [] });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.deepEqual(outcome.result, {
            variant: 'rejected',
            reason: 'provider down',
            relevanceAssessment: 'LOW',
            notes: 'provider down',
        });
        assert.equal(clients.writer.calls, 0);
    });

    test('when no researcher can start the error propagates', async () => {
        const team = new AgentTeam({
            agents: AGENTS,
            clientFor: () => {
                throw new Error('no client for provider fake');
            },
            tools: new FakeToolSource([]),
            researchAgents: 2,
            writerAgents: 1,
            parallel: true,
        });
        await assert.rejects(team.processLead(LEAD, TEST_CONTEXT), /no client for provider fake/);
    });

    test('variants failing validation are dropped and all-invalid is a rejection', async () => {
        const { team, clients } = buildTeam({
            researcher: [textReply(RESEARCH)],
            writer: [
                textReply(letterJson('First', [])),
                textReply(letterJson('Second', ['Works as COO at Acme'])),
            ],
            reviewer: [],
        });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.deepEqual(outcome.result, {
            variant: 'rejected',
            reason: 'All writer variants were rejected',
            relevanceAssessment: 'HIGH',
            notes: "variant 1: Missing personalization_signals (must reference a specific, verifiable observation) | variant 2: Generic/placeholder observation found: 'Works as COO at Acme'",
        });
        assert.equal(clients.reviewer.calls, 0);
    });

    test('signals placed next to the letter are merged into it', async () => {
        const { team } = buildTeam({
            researcher: [textReply(RESEARCH)],
            writer: [textReply(JSON.stringify({
                rejected: false,
                letter: { subject: 'Only', body: 'Body', send_time: 'Wed 09:00' },
                personalization_signals: ['Raised a Series B last month'],
            }))],
            reviewer: [textReply('{"selected_variant": 1, "confidence": "LOW"}')],
        }, { writerAgents: 1 });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.equal(outcome.result.variant, 'accepted');
        if (outcome.result.variant === 'accepted') {
            assert.deepEqual(outcome.result.letter.personalizationSignals, ['Raised a Series B last month']);
            assert.equal(outcome.result.relevanceAssessment, 'HIGH');
            assert.equal(outcome.result.notes, 'Selected variant 1 of 1 (confidence LOW)');
        }
    });

    test('a failing reviewer falls back to the first valid variant', async () => {
        const { team } = buildTeam({
            researcher: [textReply(RESEARCH)],
            writer: [
                textReply(letterJson('First', ['Opened a Berlin warehouse in March 2024'])),
                textReply(letterJson('Second', ['Hiring three demand planners'])),
            ],
            reviewer: [new Error('reviewer timeout')],
        });
        const outcome = await team.processLead(LEAD, TEST_CONTEXT);
        assert.equal(outcome.result.variant, 'accepted');
        if (outcome.result.variant === 'accepted') {
            assert.equal(outcome.result.letter.subject, 'First');
            assert.equal(outcome.result.notes, 'Selected variant 1 of 2 (confidence MEDIUM)');
        }
    });

    test('writing angles read the research insights', () => {
        const research = { insights: { primary_insight: 'p'.repeat(150), secondary_insight: 'short' } };
        assert.equal(writingAngle(0, research), `Lead with primary insight: ${'p'.repeat(100)}...`);
        assert.equal(writingAngle(1, research), 'Lead with secondary insight: short...');
        assert.equal(writingAngle(2, {}), 'Lead with primary insight: ...');
    });
});
