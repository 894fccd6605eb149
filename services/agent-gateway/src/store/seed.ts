import { promises as fsp } from 'fs';
import path from 'path';
import { isValidSlug } from '../services/instance-loader.js';
import { readYamlMapping } from '../utils/yaml-files.js';
import { DataStore } from './types.js';

export interface SeedResult {
  accounts: string[];
  instances: string[];
}

function stringField(document: Record<string, unknown> | null, key: string): string | null {
  const value = document?.[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

async function listDirectories(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries.filter(entry => entry.isDirectory()).map(entry => entry.name).sort();
}

/**
 * Creates the accounts and instances laid out as `{dir}/{account}/{instance}/config.yaml`
 * that the store does not know yet. Existing rows are left alone.
 */
export async function seedFromConfigDirectory(
  store: DataStore,
  configsDirectory: string,
  defaultAgentType: string
): Promise<SeedResult> {
  const result: SeedResult = { accounts: [], instances: [] };

  for (const accountSlug of await listDirectories(configsDirectory)) {
    if (!isValidSlug(accountSlug)) {
      console.warn(`[seed] Skipping directory ${accountSlug}: not a valid account slug`);
      continue;
    }

    const accountDir = path.join(configsDirectory, accountSlug);
    const instanceSlugs: string[] = [];
    for (const instanceSlug of await listDirectories(accountDir)) {
      const config = await readYamlMapping(path.join(accountDir, instanceSlug, 'config.yaml'));
      if (config) instanceSlugs.push(instanceSlug);
    }
    if (instanceSlugs.length === 0) continue;

    let account = await store.accounts.findBySlug(accountSlug);
    if (!account) {
      const accountConfig = await readYamlMapping(path.join(accountDir, 'account.yaml'));
      account = await store.accounts.create({ slug: accountSlug, name: stringField(accountConfig, 'name') ?? accountSlug });
      result.accounts.push(accountSlug);
    }

    for (const instanceSlug of instanceSlugs) {
      if (!isValidSlug(instanceSlug)) {
        console.warn(`[seed] Skipping ${accountSlug}/${instanceSlug}: not a valid instance slug`);
        continue;
      }
      if (await store.instances.findBySlug(account.id, instanceSlug)) continue;

      const config = await readYamlMapping(path.join(accountDir, instanceSlug, 'config.yaml'));
      await store.instances.create({
        accountId: account.id,
        instanceSlug,
        agentType: stringField(config, 'agent_type') ?? defaultAgentType,
        displayName: stringField(config, 'display_name') ?? stringField(config, 'name') ?? instanceSlug,
      });
      result.instances.push(`${accountSlug}/${instanceSlug}`);
    }
  }

  console.log(`[seed] Seeded ${result.accounts.length} account(s) and ${result.instances.length} instance(s)`);
  return result;
}
