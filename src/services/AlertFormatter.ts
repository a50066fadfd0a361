/**
 * Renders a POI discrepancy into a Slack mrkdwn message.
 * Pure: the same key, submissions and reuse info always give the same bytes.
 */

import type { DeploymentBlockKey, FingerprintSet, ReuseMap } from '../types/models.js';
import { compareFingerprints, normalizeHex } from './fingerprints.js';

export function formatDiscrepancy(
  key: DeploymentBlockKey,
  submissions: FingerprintSet,
  reuse: ReuseMap
): string {
  const lines = [
    '🚨 *New POI Discrepancy Found*',
    `*Deployment:* \`${key.deploymentId}\``,
    `*Block:* \`${key.blockNumber}\``,
    '*POI Submissions:*',
  ];

  // Callers may pass keys that differ only in prefix or case
  const byPoi = new Map<string, Set<string>>();
  for (const [raw, indexers] of submissions) {
    const poi = normalizeHex(raw);
    const merged = byPoi.get(poi) ?? new Set<string>();
    for (const address of indexers) merged.add(address.toLowerCase());
    byPoi.set(poi, merged);
  }
  const reuseByPoi = new Map<string, string[]>();
  for (const [raw, details] of reuse) {
    const poi = normalizeHex(raw);
    reuseByPoi.set(poi, [...(reuseByPoi.get(poi) ?? []), ...details]);
  }

  const pois = [...byPoi.keys()].sort(compareFingerprints);
  for (const poi of pois) {
    lines.push(`*POI Hash:* \`${poi}\``);

    const reuseLines = reuseByPoi.get(poi);
    if (reuseLines && reuseLines.length > 0) {
      lines.push('⚠️ *POI Reuse:*');
      for (const detail of reuseLines) lines.push(`  • ${detail}`);
    }

    const indexers = [...(byPoi.get(poi) ?? [])].sort();
    lines.push(`*Submitted by:* \`${indexers.join(', ')}\``);
    lines.push('');
  }

  return lines.join('\n');
}
