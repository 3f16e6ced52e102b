/**
 * Metric collectors.
 *
 * A collector turns one node into a HealthSnapshot or throws a
 * CollectionError. Local nodes are read in-process; remote nodes over SSH.
 */

import type { NodeConfig } from '../config.js';
import { CollectionError } from '../errors.js';
import type { HealthSnapshot } from '../types.js';
import { LocalCollector } from './local-collector.js';
import { SshCollector } from './remote-collector.js';

export interface CollectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface Collector {
  readonly kind: 'local' | 'ssh';
  collect(node: NodeConfig, options: CollectOptions): Promise<HealthSnapshot>;
}

export type CollectorFactory = (node: NodeConfig) => Collector;

const local = new LocalCollector();
const ssh = new SshCollector();

export const createCollector: CollectorFactory = (node) => {
  if (node.local) return local;
  if (node.ssh) return ssh;
  throw new CollectionError('config', `node ${node.name} has neither "local" nor "ssh" set`, node.name);
};
