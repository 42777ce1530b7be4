#!/usr/bin/env tsx
/**
 * Resolve the storefront topology for one deployment target
 *
 *   npm run resolve -- --backend eks-default --mode managed-dependencies --out dist/topology.json
 */

import { runResolveCommand } from '@storefront/topology';

process.exitCode = runResolveCommand(process.argv.slice(2), { write: text => process.stdout.write(text) });
