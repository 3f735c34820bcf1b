import { OutreachContext } from '../context/contextLoader';
import { LeadProfile } from '../types/domain';

function orNa(value: string): string {
    return value || 'N/A';
}

export function buildClassificationPrompt(lead: LeadProfile, gtmContext: string): string {
    return `You are an expert ICP researcher analyzing if this person matches our target profile.

## Target ICP Context:
${gtmContext}

## Profile to Analyze:
Email: ${orNa(lead.email)}
Name: ${orNa(lead.name)}
Company: ${orNa(lead.company)}
Job Title: ${orNa(lead.jobTitle)}
LinkedIn URL: ${orNa(lead.linkedinUrl)}

## Your Analysis Task:
Based on the ICP context, decide whether this lead matches the target profile.

Consider:
1. Role and seniority: does the position carry decision-making weight?
2. Company context: size, industry, growth stage.
3. Pain points: do they likely face the problems we solve?
4. Decision authority: can they influence purchasing?

Return ONLY valid JSON:
{"relevant": true, "reason": "specific signals found"}
or
{"relevant": false, "reason": "why they do not match"}`;
}

export function buildLeadSection(lead: LeadProfile): string {
    return `## LEAD INFORMATION

- **Name**: ${orNa(lead.name)}
- **Email**: ${orNa(lead.email)}
- **Company**: ${orNa(lead.company)}
- **Title**: ${orNa(lead.jobTitle)}
- **LinkedIn**: ${orNa(lead.linkedinUrl)}`;
}

export const LETTER_OUTPUT_CONTRACT = `## OUTPUT

Finish with ONE JSON object and nothing else:
{
  "rejected": false,
  "reason": null,
  "letter": {
    "subject": "...",
    "body": "...",
    "send_time": "...",
    "personalization_signals": ["specific, verifiable observation", "..."]
  },
  "relevance_assessment": "HIGH | MEDIUM | LOW",
  "notes": "..."
}

If the lead is not a fit, return {"rejected": true, "reason": "...", "letter": null, "relevance_assessment": "...", "notes": "..."}.`;

/**
 * Task for the single tool-using agent.
 */
export function buildSingleAgentTask(lead: LeadProfile, context: OutreachContext): string {
    return [
        '# Task: Cold Outreach Letter Generation',
        buildLeadSection(lead),
        `## Instructions\n\n${context.instruction}`,
        `## ICP & Value Proposition\n\n${context.gtm}`,
        context.guides ? `## Writing Guides\n\n${context.guides}` : '',
        LETTER_OUTPUT_CONTRACT,
    ].filter(Boolean).join('\n\n');
}

export function buildSummarizationPrompt(transcript: string): string {
    return `You are summarizing research and analysis results for context compression.

Extract and keep ONLY the findings relevant to writing a personalized cold email:

${transcript}

Write a concise summary (max 500 words) covering:
1. Key facts about the person (recent activity, role, interests)
2. Key facts about the company (stage, challenges, news)
3. Important insights or patterns
4. Any rejection signals or red flags

Keep specific, actionable details. Drop verbose explanations and repetition.`;
}

export interface AgentPromptInput {
    instructions: string;
    lead: LeadProfile | null;
    context: OutreachContext | null;
    additionalContext: string;
}

export function buildAgentTaskPrompt(input: AgentPromptInput): string {
    const parts = [input.instructions];
    if (input.lead) {
        parts.push(buildLeadSection(input.lead));
    }
    if (input.context) {
        parts.push(`## PROJECT CONTEXT

### ICP & Value Proposition
${input.context.gtm}

### Writing Guides
${input.context.guides}`);
    }
    if (input.additionalContext) {
        parts.push(input.additionalContext);
    }
    return parts.join('\n\n');
}
