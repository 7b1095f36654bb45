import type { Lead } from './normalize.js';

export type OutreachInput = Pick<Lead, 'propertyName' | 'address' | 'managementCompany'>;

export type Outreach = {
  callScript: string;
  email: { subject: string; body: string };
};

const CALL_SCRIPT =
  'Hi, {{greeting}} I\'m calling for {{companyRef}} about {{property}}{{location}}. ' +
  'We work with multifamily communities in the area and I\'d love two minutes to see whether ' +
  'there is a fit. Who would be the best person to speak with?';

const EMAIL_SUBJECT = 'Quick question about {{property}}';

const EMAIL_BODY = [
  'Hello {{salutation}},',
  '',
  'I came across {{property}}{{location}} and wanted to reach out directly. ' +
    'We partner with multifamily owners and managers in the area and think we could help.',
  '',
  'Would you be open to a short call this week?',
  '',
  'Best regards,',
  '{{signature}}',
].join('\n');

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_, key: string) => values[key] ?? '');
}

/** Call script and email copy for one lead. Pure; nothing is sent. */
export function buildOutreach(input: OutreachInput, sender = ''): Outreach {
  const property = input.propertyName || input.address || 'your property';
  const values = {
    greeting: sender ? `this is ${sender}.` : 'there.',
    companyRef: input.managementCompany ? `the team at ${input.managementCompany}` : 'the leasing office',
    salutation: input.managementCompany ? `${input.managementCompany} team` : 'there',
    property,
    location: input.propertyName && input.address ? ` at ${input.address}` : '',
    signature: sender || 'The Outreach Team',
  };
  return {
    callScript: fill(CALL_SCRIPT, values),
    email: {
      subject: fill(EMAIL_SUBJECT, values),
      body: fill(EMAIL_BODY, values),
    },
  };
}
