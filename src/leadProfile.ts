import { LeadProfile, LeadRow } from './types/domain';
import { normalizeLinkedInUrl } from './linkedinUrl';

/**
 * Reads the first non-empty value among several possible column names.
 */
export function pickField(row: LeadRow, ...keys: string[]): string {
    for (const key of keys) {
        const val = row[key];
        if (typeof val === 'string' && val.trim()) {
            return val.trim();
        }
    }
    return '';
}

export function pickEmail(row: LeadRow): string {
    return pickField(row, 'Email', 'email');
}

export function pickLinkedInUrl(row: LeadRow): string {
    const raw = pickField(row, 'linkedIn', 'linkedin_url', 'LinkedIn');
    return raw ? normalizeLinkedInUrl(raw) : '';
}

/**
 * Builds the fixed lead schema from a raw CSV row. Both the standard column
 * names (email, name, company, job_title, linkedin_url) and the vendor export
 * names (Email, First Name, Last Name, companyName, jobTitle, linkedIn) are read.
 */
export function buildLeadProfile(row: LeadRow): LeadProfile {
    const firstName = pickField(row, 'First Name', 'first_name');
    const lastName = pickField(row, 'Last Name', 'last_name');
    const joined = [firstName, lastName].filter(Boolean).join(' ');
    const name = joined || pickField(row, 'name', 'Name');

    let resolvedFirst = firstName;
    let resolvedLast = lastName;
    if (!joined && name) {
        const [head, ...rest] = name.split(/\s+/);
        resolvedFirst = head;
        resolvedLast = rest.join(' ');
    }

    return {
        email: pickEmail(row),
        name,
        firstName: resolvedFirst,
        lastName: resolvedLast,
        company: pickField(row, 'companyName', 'company', 'Company'),
        jobTitle: pickField(row, 'jobTitle', 'job_title', 'Title'),
        linkedinUrl: pickLinkedInUrl(row),
    };
}

export function describeLead(lead: LeadProfile): string {
    const who = lead.name || lead.email;
    return lead.company ? `${who} (${lead.company})` : who;
}
