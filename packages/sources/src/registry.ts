import { SOURCE_IDS, type DateRange, type RawDataset, type SourceFetcher, type SourceId, type SourceSpec } from '@citeline/core';
import type { SourceStatus, SourcesConfig } from './types.js';
import { createTrafficSource } from './traffic/source.js';
import { createSearchSource } from './search/source.js';
import { createAdsSource } from './ads/source.js';
import { createReplaySource, snapshotRange } from './replay.js';

/**
 * Builds fetchers from resolved configuration. Sources keep the canonical
 * order whatever order the config lists them in.
 */
export class SourceRegistry {
  constructor(
    private readonly config: SourcesConfig,
    private readonly replay?: RawDataset[],
  ) {}

  /** Registry that serves saved datasets for every enabled source. */
  static fromSnapshot(config: SourcesConfig, datasets: RawDataset[]): SourceRegistry {
    return new SourceRegistry(config, datasets);
  }

  get isReplay(): boolean {
    return this.replay !== undefined;
  }

  /** Window the replayed snapshot covers; undefined when fetching live. */
  replayRange(): DateRange | undefined {
    return this.replay ? snapshotRange(this.replay) : undefined;
  }

  status(id: SourceId): SourceStatus {
    const entry = this.config[id];
    const missing = this.replay ? [] : this.missingSettings(id);
    return {
      id,
      enabled: entry.enabled,
      required: entry.required,
      configured: missing.length === 0,
      missing,
    };
  }

  statuses(): SourceStatus[] {
    return SOURCE_IDS.map(id => this.status(id));
  }

  /** Specs for the pipeline. Unconfigured sources come without a fetcher. */
  specs(): SourceSpec[] {
    return SOURCE_IDS.filter(id => this.config[id].enabled).map(id => ({
      id,
      required: this.config[id].required,
      fetcher: this.fetcher(id),
    }));
  }

  fetcher(id: SourceId): SourceFetcher | undefined {
    if (this.replay) return createReplaySource(id, this.replay);

    const token = this.config.accessToken;
    if (!token) return undefined;

    switch (id) {
      case 'traffic': {
        const { propertyId } = this.config.traffic;
        return propertyId ? createTrafficSource({ accessToken: token, propertyId }) : undefined;
      }
      case 'search': {
        const { siteUrl } = this.config.search;
        return siteUrl ? createSearchSource({ accessToken: token, siteUrl }) : undefined;
      }
      case 'ads': {
        const { customerId, developerToken, loginCustomerId } = this.config.ads;
        return customerId && developerToken
          ? createAdsSource({ accessToken: token, customerId, developerToken, loginCustomerId })
          : undefined;
      }
    }
  }

  private missingSettings(id: SourceId): string[] {
    const missing: string[] = [];
    if (!this.config.accessToken) missing.push('sources.access_token');
    switch (id) {
      case 'traffic':
        if (!this.config.traffic.propertyId) missing.push('sources.traffic.property_id');
        break;
      case 'search':
        if (!this.config.search.siteUrl) missing.push('sources.search.site_url');
        break;
      case 'ads':
        if (!this.config.ads.customerId) missing.push('sources.ads.customer_id');
        if (!this.config.ads.developerToken) missing.push('sources.ads.developer_token');
        break;
    }
    return missing;
  }
}
