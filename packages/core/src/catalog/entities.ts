/**
 * Entity catalog
 *
 * The fixed list of streams this connector extracts. Compound names such as
 * `applications.interviews` walk a nested relation: every application is
 * fetched, then the interviews of each one, and only the interviews are
 * emitted.
 */

import { EntityResolutionError } from '../errors';
import type { ResourceDirectory } from '../sync/accessor';

export const ENTITIES = [
  'applications',
  'candidates',
  'close_reasons',
  'degrees',
  'departments',
  'job_posts',
  'jobs',
  'offers',
  'scorecards',
  'users',
  'custom_fields',
  'demographics_question_sets',
  'demographics_questions',
  'demographics_answer_options',
  'demographics_answers',
  'applications.demographics_answers',
  'demographics_question_sets.questions',
  'demographics_answers.answer_options',
  'interviews',
  'applications.interviews',
  'sources',
  'rejection_reasons',
  'jobs.openings',
  'job_stages',
  'jobs.stages'
] as const;

export type EntityName = (typeof ENTITIES)[number];

export interface RootEntity {
  kind: 'root';
  name: string;
  resource: string;
}

export interface NestedEntity {
  kind: 'nested';
  name: string;
  resource: string;
  // Relations to descend through, outermost first
  relations: string[];
}

export type EntityDescriptor = RootEntity | NestedEntity;

export function splitEntityName(name: string): { resource: string; relations: string[] } {
  const [resource, ...relations] = name.split('.');
  return { resource, relations };
}

export function describeEntity(name: string, directory: ResourceDirectory): EntityDescriptor {
  const { resource, relations } = splitEntityName(name);

  if (!resource || !directory.hasResource(resource)) {
    throw new EntityResolutionError(name, `unknown resource '${resource}'`);
  }

  let parent = resource;
  for (const relation of relations) {
    if (!directory.hasRelation(parent, relation)) {
      throw new EntityResolutionError(name, `'${relation}' is not a relation of '${parent}'`);
    }
    parent = relation;
  }

  if (relations.length === 0) {
    return { kind: 'root', name, resource };
  }
  return { kind: 'nested', name, resource, relations };
}

/**
 * Resolves every entity once, up front. Building a catalog over a directory
 * that lacks one of the names throws.
 */
export class EntityCatalog {
  private readonly descriptors = new Map<string, EntityDescriptor>();

  constructor(directory: ResourceDirectory, names: readonly string[] = ENTITIES) {
    for (const name of names) {
      this.descriptors.set(name, describeEntity(name, directory));
    }
  }

  get names(): string[] {
    return [...this.descriptors.keys()];
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  resolve(name: string): EntityDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new EntityResolutionError(name, 'not in the catalog');
    }
    return descriptor;
  }

  [Symbol.iterator](): IterableIterator<EntityDescriptor> {
    return this.descriptors.values();
  }
}
