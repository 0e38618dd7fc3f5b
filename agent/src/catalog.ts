import { readFileSync } from 'node:fs';
import { z } from 'zod';

const appCatalogFileSchema = z.object({
  ownBundleIds: z.array(z.string()),
  browsers: z.record(z.string()),
  alwaysAllowed: z.array(z.string()),
  systemPrefix: z.string(),
  systemEntertainment: z.array(z.string()),
});

export type AppCatalog = {
  ownBundleIds: ReadonlySet<string>;
  browsers: ReadonlyMap<string, string>;
  alwaysAllowed: ReadonlySet<string>;
  systemPrefix: string;
  systemEntertainment: ReadonlySet<string>;
};

export type AppClass = 'own' | 'browser' | 'alwaysAllowed' | 'distracting' | 'scored';

const DEFAULT_CATALOG_URL = new URL('../data/apps.json', import.meta.url);

export const loadAppCatalog = (file: URL | string = DEFAULT_CATALOG_URL): AppCatalog => {
  const raw = appCatalogFileSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
  return {
    ownBundleIds: new Set(raw.ownBundleIds),
    browsers: new Map(Object.entries(raw.browsers)),
    alwaysAllowed: new Set(raw.alwaysAllowed),
    systemPrefix: raw.systemPrefix,
    systemEntertainment: new Set(raw.systemEntertainment),
  };
};

export const classifyApp = (catalog: AppCatalog, bundleId: string, distracting: readonly string[]): AppClass => {
  if (catalog.ownBundleIds.has(bundleId)) return 'own';
  if (catalog.browsers.has(bundleId)) return 'browser';
  if (catalog.alwaysAllowed.has(bundleId)) return 'alwaysAllowed';
  // System apps are allowed except the entertainment ones, which still get scored
  if (bundleId.startsWith(catalog.systemPrefix) && !catalog.systemEntertainment.has(bundleId)) return 'alwaysAllowed';
  if (distracting.includes(bundleId)) return 'distracting';
  return 'scored';
};
