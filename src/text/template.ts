import { TenantProfile } from '../config/types';
import { ConfigurationError } from '../errors';

export const PLACEHOLDERS = [
  'phone',
  'email',
  'company_name',
  'website',
  'business_hours',
  'locations',
  'emergency_phone',
  'booking_link',
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

export type TemplateValues = Readonly<Record<Placeholder, string>>;

const PLACEHOLDER_RE = /\{([a-z_]+)\}/g;

const PLACEHOLDER_SET: ReadonlySet<string> = new Set(PLACEHOLDERS);

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDER_SET.has(name);
}

export function templateValues(profile: TenantProfile): TemplateValues {
  return Object.freeze({
    phone: profile.phone,
    email: profile.email,
    company_name: profile.companyName,
    website: profile.website ?? '',
    business_hours: profile.businessHours,
    locations: profile.locations.join(', '),
    emergency_phone: profile.emergencyPhone ?? profile.phone,
    booking_link: profile.bookingLink ?? profile.website ?? '',
  });
}

/** Names inside `{...}` that are not known placeholders */
export function unknownPlaceholders(template: string): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    if (!isPlaceholder(match[1])) unknown.push(match[1]);
  }
  return unknown;
}

/**
 * Single left-to-right pass: a substituted value is never scanned again,
 * so a profile value that itself looks like `{phone}` stays literal.
 */
export function renderTemplate(template: string, values: TemplateValues, where = 'template'): string {
  const unknown = unknownPlaceholders(template);
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown placeholder(s) in ${where}: ${unknown.join(', ')}`, { where, unknown });
  }
  return template.replace(PLACEHOLDER_RE, (_whole, name: string) => (isPlaceholder(name) ? values[name] : _whole));
}
