import { KnownFacts } from './types';

const EMAIL_RE = /[\p{L}\p{N}._%+-]+@[\p{L}\p{N}.-]+\.[\p{L}]{2,}/u;
// Swedish mobile/landline (07x-xxx xx xx, 031-123 45 67, +46 ...)
const PHONE_RE = /(?:\+46|0046|\b0)[\s-]?\d{1,3}(?:[\s-]?\d{2,3}){2,4}\b/;
const NAME_RE = /(?:[Jj]ag heter|[Mm]itt namn är|[Mm]y name is|I am called)\s+([\p{Lu}][\p{L}-]+(?:\s+[\p{Lu}][\p{L}-]+)?)/u;
const PROPERTY_RE =
  /(?:jag bor på|jag bor i|adressen är|min adress är|adress:|i live at|my address is)\s+([^,.!?\n]{3,60}?\d+\s?[a-zA-Z]?)\b/iu;

/**
 * Pull contact details out of a message. Only returns keys it found;
 * callers merge the result over what the session already knows.
 */
export function extractFacts(text: string): KnownFacts {
  const facts: KnownFacts = {};

  const email = text.match(EMAIL_RE);
  if (email) facts.email = email[0].toLowerCase();

  const withoutEmail = email ? text.replace(email[0], ' ') : text;
  const phone = withoutEmail.match(PHONE_RE);
  if (phone) facts.phone = phone[0].replace(/[\s-]/g, '');

  const name = text.match(NAME_RE);
  if (name) facts.name = name[1].trim();

  const property = text.match(PROPERTY_RE);
  if (property) facts.property = property[1].trim();

  return facts;
}
