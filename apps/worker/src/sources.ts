import { himalayasAdapter } from '@jobhound/parser-himalayas';
import { linkedInAdapter } from '@jobhound/parser-linkedin';
import { naukriAdapter } from '@jobhound/parser-naukri';
import { relocateMeAdapter } from '@jobhound/parser-relocateme';
import { remotiveAdapter } from '@jobhound/parser-remotive';
import type { SourceAdapter } from '@jobhound/parser-sdk';
import { weWorkRemotelyAdapter } from '@jobhound/parser-weworkremotely';
import { ConfigurationError } from './config.js';

// Order matters: on a duplicate posting the earlier adapter's copy wins.
const allAdapters: readonly SourceAdapter[] = [
  remotiveAdapter,
  weWorkRemotelyAdapter,
  himalayasAdapter,
  relocateMeAdapter,
  naukriAdapter,
  linkedInAdapter,
];

function buildAdapterMap(adapters: readonly SourceAdapter[]): Map<string, SourceAdapter> {
  const adapterMap = new Map<string, SourceAdapter>();

  for (const adapter of adapters) {
    if (adapterMap.has(adapter.manifest.id)) {
      throw new Error(`Duplicate source id: ${adapter.manifest.id}`);
    }

    adapterMap.set(adapter.manifest.id, adapter);
  }

  return adapterMap;
}

const adapterMap = buildAdapterMap(allAdapters);

export function getAllAdapters(): SourceAdapter[] {
  return [...allAdapters];
}

export function getEnabledAdapters(disabledSources: readonly string[]): SourceAdapter[] {
  for (const sourceId of disabledSources) {
    if (!adapterMap.has(sourceId)) {
      throw new ConfigurationError(`Unknown source id in disabledSources: ${sourceId}`);
    }
  }

  const disabled = new Set(disabledSources);
  return allAdapters.filter((adapter) => !disabled.has(adapter.manifest.id));
}
