import { parseISO } from 'date-fns';
import { TeamInboxMessage } from '../flowdock/flowdock.types';
import { changedFields } from '../salesforce/opportunity.service';
import { ChatterDetail, Opportunity } from '../salesforce/salesforce.types';

const MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
];

const MISSING = '-';

const NUMBER_FORMAT = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 20,
});

/** 50000 → "50,000"; fractions are kept as they are. */
export function formatNumber(n: number): string {
  return NUMBER_FORMAT.format(n === 0 ? 0 : n);
}

const GMT_OFFSET = /^GMT[+-]/;

// en-GB names European zones (BST, CET), en-US names American ones (EST)
function zoneName(date: Date, timeZone: string): string {
  let name = '';
  for (const locale of ['en-GB', 'en-US']) {
    name =
      new Intl.DateTimeFormat(locale, { timeZone, timeZoneName: 'short' })
        .formatToParts(date)
        .find((p) => p.type === 'timeZoneName')?.value ?? '';
    if (!GMT_OFFSET.test(name)) {
      break;
    }
  }
  return name;
}

/** "05 Mar 2024 at 14:07 UTC" in the given IANA time zone. */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';

  const month = MONTHS[Number(part('month')) - 1];
  return `${part('day')} ${month} ${part('year')} at ${part('hour')}:${part('minute')} ${zoneName(date, timeZone)}`;
}

/** `text`, or its first `maxLen - 1` characters followed by "…". */
export function snippet(text: string, maxLen = 40): string {
  if (maxLen < 1) {
    throw new RangeError('maxLen must be ≥ 1');
  }
  const chars = Array.from(text);
  if (chars.length > maxLen) {
    return chars.slice(0, maxLen - 1).join('') + '…';
  }
  return text;
}

function display(value: string | number | null): string {
  if (value === null) {
    return MISSING;
  }
  return typeof value === 'number' ? formatNumber(value) : value;
}

export function formatOpportunitySummary(op: Opportunity): string {
  let txt =
    `Stage: ${op.stageName ?? MISSING}, Owner: ${op.ownerName ?? MISSING}, ` +
    `Account: ${op.accountName ?? MISSING}.`;

  const lineItems: string[] = [];
  if (op.amount) {
    lineItems.push(`Amount: ${formatNumber(op.amount)}`);
  }
  if (op.probability) {
    lineItems.push(`Probability: ${formatNumber(op.probability)}%`);
  }
  if (op.averageHourPrice) {
    lineItems.push(`Avg. hour price: ${formatNumber(op.averageHourPrice)}`);
  }
  if (op.closeDate) {
    lineItems.push(`Close date: ${op.closeDate}`);
  }
  if (op.typeOfSales) {
    lineItems.push(`Type of sales: ${op.typeOfSales}`);
  }
  if (lineItems.length > 0) {
    txt += `\n${lineItems.join(', ')}.`;
  }
  return txt;
}

export function formatNewOpportunity(
  op: Opportunity,
  timeZone: string,
): TeamInboxMessage {
  let txt = op.description ? `${op.description}\n\n` : '';

  const created = formatTimestamp(parseISO(op.createdDate), timeZone);
  txt += `– ${created} created by ${op.createdByName ?? MISSING}`;

  if (op.lastModifiedDate !== op.createdDate) {
    const modified = formatTimestamp(parseISO(op.lastModifiedDate), timeZone);
    txt += `\n– ${modified} modified by ${op.lastModifiedByName ?? MISSING}`;
  }

  txt += `\n\n${formatOpportunitySummary(op)}`;

  return {
    teamName: op.team,
    subject: `${op.name} — ${op.createdByName ?? MISSING}`,
    textContent: txt,
    project: op.accountName,
  };
}

export function formatChangedOpportunity(
  oldOp: Opportunity,
  newOp: Opportunity,
  timeZone: string,
): TeamInboxMessage {
  let txt = 'Updated fields:\n';
  for (const [field, label] of changedFields(oldOp, newOp)) {
    if (field === 'description') {
      txt += `${label}: ${display(newOp.description)}\n`;
    } else {
      const before = snippet(display(oldOp[field]));
      const after = snippet(display(newOp[field]));
      txt += `${label}: ${before} → ${after}\n`;
    }
  }

  const modified = formatTimestamp(parseISO(newOp.lastModifiedDate), timeZone);
  txt += `\n– ${modified} modified by ${newOp.lastModifiedByName ?? MISSING}`;
  txt += `\n\n${formatOpportunitySummary(newOp)}`;

  return {
    teamName: newOp.team,
    subject: `[updated] ${newOp.name} — ${newOp.lastModifiedByName ?? MISSING}`,
    textContent: txt,
    project: newOp.accountName,
  };
}

export function formatChatter(
  detail: ChatterDetail,
  timeZone: string,
): TeamInboxMessage {
  const op = detail.opportunity;
  let txt = detail.text ? `${detail.text}\n\n` : '';

  const time = formatTimestamp(parseISO(detail.modifiedDate), timeZone);
  txt += `– ${detail.actorName} (${time})`;
  txt += `\n\n${formatOpportunitySummary(op)}`;

  return {
    teamName: op.team,
    subject: `[chatter] ${op.name} – ${detail.actorName}`,
    textContent: txt,
    project: op.accountName,
  };
}
