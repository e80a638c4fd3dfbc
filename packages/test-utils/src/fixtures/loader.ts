/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { GraphBuilder, type WeightedGraph } from '../builders/graph-builder.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const GRAPHS_DIR = path.join(__dirname, 'graphs');

/**
 * On-disk graph fixture format
 */
export const graphFixtureSchema = z.object({
  description: z.string().optional(),
  start: z.string(),
  goals: z.array(z.string()).min(1),
  edges: z.array(z.tuple([z.string(), z.string(), z.number()])),
  heuristic: z.record(z.number()).optional(),
  undirected: z.boolean().default(false),
});

export type GraphFixture = z.infer<typeof graphFixtureSchema>;

/**
 * Get the absolute path to a graph fixture file
 */
export function getFixturePath(name: string): string {
  return path.join(GRAPHS_DIR, name.endsWith('.json') ? name : `${name}.json`);
}

/**
 * Read and validate a graph fixture without building it
 *
 * @throws Error if the fixture is missing or malformed
 */
export function readGraphFixture(name: string): GraphFixture {
  const fullPath = getFixturePath(name);
  const content: unknown = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
  const parsed = graphFixtureSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid graph fixture ${name}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load a graph fixture
 */
export function loadGraphFixture(name: string): WeightedGraph {
  const fixture = readGraphFixture(name);
  const builder = new GraphBuilder().from(fixture.start).goal(...fixture.goals);

  for (const [from, to, cost] of fixture.edges) {
    if (fixture.undirected) {
      builder.undirected(from, to, cost);
    } else {
      builder.edge(from, to, cost);
    }
  }
  if (fixture.heuristic) {
    builder.heuristic(fixture.heuristic);
  }
  return builder.build();
}
