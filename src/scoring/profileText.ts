import { cleanText, extractNumber } from '../lib/text';
import { isLikelyName } from '../conversation/inputClassifier';
import type { ProfileRecord } from '../types';

function isConnectionLine(line: string): boolean {
  return line.toLowerCase().includes('connection');
}

/**
 * Build a ProfileRecord from text pasted off a profile page:
 * name, headline, an optional "500+ connections" line, then free-form summary.
 * A single line that does not look like a name is taken as the headline.
 */
export function parseProfileText(text: string): ProfileRecord {
  const lines = (text ?? '')
    .split(/\r?\n/)
    .map((l) => cleanText(l))
    .filter((l) => l.length > 0);

  const profile: ProfileRecord = { name: '', headline: '', summary: '', connections: 0 };
  if (lines.length === 0) return profile;

  if (lines.length === 1 && !isLikelyName(lines[0])) {
    profile.headline = lines[0];
    return profile;
  }

  profile.name = lines[0];
  const rest = lines.slice(1);
  const summary: string[] = [];
  for (const line of rest) {
    if (isConnectionLine(line)) {
      if (profile.connections === 0) profile.connections = extractNumber(line) ?? 0;
    } else if (!profile.headline) {
      profile.headline = line;
    } else {
      summary.push(line);
    }
  }
  profile.summary = summary.join(' ');
  return profile;
}
