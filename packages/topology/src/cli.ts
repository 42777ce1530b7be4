/**
 * Resolve command
 *
 * Usage: resolve-topology --backend <backend> --mode <mode> [--catalog file.json] [--out file.json]
 *
 * Prints (or writes) the resolved topology as JSON. Exit code 1 on a resolution
 * error, 2 on bad arguments.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parseArgs } from 'node:util';
import { getLogger, serializeError } from '@storefront/platform-core';
import { parseTarget } from './backends/profiles.js';
import { loadCatalog } from './catalog/load-catalog.js';
import { CatalogError, TopologyError } from './errors.js';
import { createDefaultRegistry } from './registry/storefront-providers.js';
import { resolve } from './resolve.js';

const logger = getLogger('resolve-topology');

export interface CommandOutput {
  write(text: string): void;
}

const USAGE =
  'Usage: resolve-topology --backend <eks-default|eks-minimal|ecs-default|apprunner> ' +
  '--mode <managed-dependencies|in-cluster-dependencies> [--catalog file.json] [--out file.json]';

function readCatalogFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new CatalogError(`cannot read ${path}`, { path }, error instanceof Error ? error : undefined);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new CatalogError(`${path} is not valid JSON`, { path }, error instanceof Error ? error : undefined);
  }
}

export function runResolveCommand(argv: string[], output: CommandOutput, env: NodeJS.ProcessEnv = process.env): number {
  let values: { backend?: string; mode?: string; catalog?: string; out?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        backend: { type: 'string' },
        mode: { type: 'string' },
        catalog: { type: 'string' },
        out: { type: 'string' },
      },
      strict: true,
    }));
  } catch (error) {
    logger.error('Invalid arguments', { error: serializeError(error, false) });
    output.write(`${USAGE}\n`);
    return 2;
  }

  if (!values.backend || !values.mode) {
    output.write(`${USAGE}\n`);
    return 2;
  }

  try {
    const target = parseTarget(values.backend, values.mode);
    const catalog = loadCatalog(values.catalog ? readCatalogFile(values.catalog) : undefined);
    const topology = resolve(catalog, createDefaultRegistry(), target.backend, target.mode, { env });
    const json = `${JSON.stringify(topology, null, 2)}\n`;

    if (values.out) {
      mkdirSync(dirname(values.out), { recursive: true });
      writeFileSync(values.out, json);
      logger.info('Topology written', { path: values.out, nodes: topology.graph.nodes.length });
    } else {
      output.write(json);
    }
    return 0;
  } catch (error) {
    if (error instanceof TopologyError) {
      output.write(`${JSON.stringify({ error: error.toJSON() }, null, 2)}\n`);
      return 1;
    }
    throw error;
  }
}
