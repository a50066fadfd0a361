/**
 * Graphix GraphQL discovery source.
 * Lists known indexers, then collects every (deployment, block) key each of
 * them has a POI agreement ratio for. No SDK dependency, uses native fetch.
 */

import type { IDiscoverySource } from './IDiscoverySource.js';
import type { ILogProvider } from './ILogProvider.js';
import type { DeploymentBlockKey } from '../types/models.js';
import { DiscoveryError } from '../errors.js';
import { dedupeKeys } from '../services/fingerprints.js';

export interface GraphixDiscoverySourceOptions {
  apiUrl: string;
  /** Maximum number of indexers fetched per cycle. Default: 100. */
  indexerLimit?: number;
  /** Abort each GraphQL request after this many ms. Default: 10_000. */
  timeoutMs?: number;
}

interface GraphQLResponse {
  data?: Record<string, unknown>;
  errors?: unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, name: string): unknown {
  return isRecord(value) ? value[name] : undefined;
}

/** Pull a key out of one poiAgreementRatios entry, or null if the entry is malformed. */
function keyFromAgreement(agreement: unknown): DeploymentBlockKey | null {
  const poi = field(agreement, 'poi');
  const cid = field(field(poi, 'deployment'), 'cid');
  const rawNumber = field(field(poi, 'block'), 'number');
  const blockNumber = typeof rawNumber === 'string' ? Number(rawNumber) : rawNumber;

  if (typeof cid !== 'string' || cid.length === 0) return null;
  if (typeof blockNumber !== 'number' || !Number.isSafeInteger(blockNumber) || blockNumber < 0) {
    return null;
  }
  return { deploymentId: cid, blockNumber };
}

export class GraphixDiscoverySource implements IDiscoverySource {
  private readonly apiUrl: string;
  private readonly indexerLimit: number;
  private readonly timeoutMs: number;

  constructor(
    options: GraphixDiscoverySourceOptions,
    private readonly logger: ILogProvider
  ) {
    this.apiUrl = options.apiUrl;
    this.indexerLimit = options.indexerLimit ?? 100;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async listCandidateKeys(signal?: AbortSignal): Promise<DeploymentBlockKey[]> {
    const indexers = await this.fetchIndexers(signal);
    if (indexers.length === 0) {
      this.logger.warn('Graphix returned no indexers');
      return [];
    }

    const keys: DeploymentBlockKey[] = [];
    let malformed = 0;
    for (const address of indexers) {
      this.logger.debug('Fetching POIs for indexer', { indexerAddress: address });
      const agreements = await this.fetchAgreements(address, signal);
      for (const agreement of agreements) {
        const key = keyFromAgreement(agreement);
        if (key) keys.push(key);
        else malformed++;
      }
    }

    if (malformed > 0) {
      this.logger.warn('Skipped malformed POI agreement entries', { count: malformed });
    }
    return dedupeKeys(keys);
  }

  private async fetchIndexers(signal?: AbortSignal): Promise<string[]> {
    const data = await this.request(
      `query { indexers(limit: ${this.indexerLimit}) { address } }`,
      signal
    );
    const indexers = data.indexers;
    if (!Array.isArray(indexers)) {
      throw new DiscoveryError('Unexpected GraphQL response format: missing indexers');
    }
    return indexers
      .map((indexer) => field(indexer, 'address'))
      .filter((address): address is string => typeof address === 'string');
  }

  private async fetchAgreements(indexerAddress: string, signal?: AbortSignal): Promise<unknown[]> {
    const data = await this.request(
      `query {
        poiAgreementRatios(indexerAddress: ${JSON.stringify(indexerAddress)}) {
          poi {
            hash
            block { number }
            deployment { cid }
            indexer { address }
          }
        }
      }`,
      signal
    );
    const agreements = data.poiAgreementRatios;
    if (!Array.isArray(agreements)) {
      throw new DiscoveryError('Unexpected GraphQL response format: missing poiAgreementRatios', {
        indexerAddress,
      });
    }
    return agreements;
  }

  private async request(query: string, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(this.apiUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ query }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      const reason = timeout.aborted ? `timed out after ${this.timeoutMs}ms` : 'request failed';
      throw new DiscoveryError(`Graphix API ${reason}`, { apiUrl: this.apiUrl }, { cause: err });
    }

    if (!res.ok) {
      throw new DiscoveryError(`Graphix API error (${res.status})`, { status: res.status });
    }

    const body: unknown = await res.json().catch(() => null);
    if (!isRecord(body)) {
      throw new DiscoveryError('Graphix API returned a non-JSON body');
    }
    const response: GraphQLResponse = {
      data: isRecord(body.data) ? body.data : undefined,
      errors: Array.isArray(body.errors) ? body.errors : undefined,
    };
    if (response.errors && response.errors.length > 0) {
      throw new DiscoveryError('Graphix API returned GraphQL errors', { errors: response.errors });
    }
    if (!response.data) {
      throw new DiscoveryError('Unexpected GraphQL response format: missing data');
    }
    return response.data;
  }
}
