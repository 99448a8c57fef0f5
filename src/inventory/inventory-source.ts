import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { InventoryFileSchema, type ClusterSnapshot } from '../schemas/index.js';

export class InventoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InventoryError';
  }
}

export interface InventorySource {
  describeCluster(clusterName: string): Promise<ClusterSnapshot>;
}

/**
 * Cluster inventory exported to a JSON file, either `{ clusters: [...] }` or a single snapshot.
 */
export class FileInventorySource implements InventorySource {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  private load(): ClusterSnapshot[] {
    if (!existsSync(this.filePath)) {
      throw new InventoryError(`Inventory file not found: ${this.filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InventoryError(`Inventory file is not valid JSON: ${reason}`);
    }

    const parsed = InventoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new InventoryError(`Invalid inventory file ${this.filePath}: ${details}`);
    }

    console.log(`[Inventory] Loaded: ${this.filePath}`);
    return 'clusters' in parsed.data ? parsed.data.clusters : [parsed.data];
  }

  async describeCluster(clusterName: string): Promise<ClusterSnapshot> {
    const clusters = this.load();
    const cluster = clusters.find((c) => c.clusterName === clusterName);
    if (!cluster) {
      const known = clusters.map((c) => c.clusterName).join(', ') || 'none';
      throw new InventoryError(`Cluster "${clusterName}" not found in inventory (known: ${known})`);
    }
    return cluster;
  }
}
