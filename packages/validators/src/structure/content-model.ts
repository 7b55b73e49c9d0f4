import { z } from 'zod';
import type { InvoiceProfile } from '@einvoice-fr/contracts';
import { ConfigurationError } from '@einvoice-fr/shared';
import { readJsonAsset } from '../assets.js';

export type Syntax = 'cii' | 'ubl';

/** Marks an element whose content is not checked */
export const ANY_CONTENT = 'any';

const qualifiedName = z.string().regex(/^[A-Za-z][\w-]*:[A-Za-z][\w-]*$/, 'Expected a prefixed element name');

const particleSchema = z
  .object({
    element: qualifiedName,
    type: z.string().optional(),
    min: z.number().int().min(0).default(1),
    max: z.union([z.number().int().min(1), z.literal('unbounded')]).default(1),
    profiles: z.array(z.string()).optional(),
    value: z.string().optional(),
    attributes: z.array(z.string()).default([]),
  })
  .strict();

const contentModelSchema = z
  .object({
    syntax: z.enum(['cii', 'ubl']),
    namespaces: z.record(z.string()),
    values: z.record(z.string()).default({}),
    roots: z.array(z.object({ element: qualifiedName, type: z.string() }).strict()).min(1),
    types: z.record(z.array(particleSchema)),
  })
  .superRefine((doc, ctx) => {
    const checkName = (name: string, path: (string | number)[]): void => {
      const prefix = name.slice(0, name.indexOf(':'));
      if (doc.namespaces[prefix] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Undeclared prefix '${prefix}'`, path });
      }
    };
    const checkType = (type: string | undefined, path: (string | number)[]): void => {
      if (type !== undefined && type !== ANY_CONTENT && doc.types[type] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown type '${type}'`, path });
      }
    };

    doc.roots.forEach((root, index) => {
      checkName(root.element, ['roots', index, 'element']);
      checkType(root.type, ['roots', index, 'type']);
    });
    for (const [typeName, particles] of Object.entries(doc.types)) {
      particles.forEach((particle, index) => {
        checkName(particle.element, ['types', typeName, index, 'element']);
        checkType(particle.type, ['types', typeName, index, 'type']);
        if (particle.value !== undefined && doc.values[particle.value] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown value pattern '${particle.value}'`,
            path: ['types', typeName, index, 'value'],
          });
        }
      });
    }
  });

type ContentModelDocument = z.infer<typeof contentModelSchema>;

/**
 * One element slot in a content sequence, already narrowed to a profile.
 * `type` undefined means text content; `any` means unchecked content.
 */
export interface ParticleRule {
  readonly name: string;
  readonly namespace: string;
  readonly min: number;
  readonly max: number;
  readonly type?: string;
  readonly pattern?: RegExp;
  readonly attributes: readonly string[];
}

export interface RootRule {
  readonly name: string;
  readonly namespace: string;
  readonly type: string;
}

export interface ContentModel {
  readonly syntax: Syntax;
  readonly profile: InvoiceProfile;
  readonly roots: readonly RootRule[];
  readonly types: ReadonlyMap<string, readonly ParticleRule[]>;
}

const documents = new Map<Syntax, ContentModelDocument>();
const compiled = new Map<string, ContentModel>();

function loadDocument(syntax: Syntax): ContentModelDocument {
  const cached = documents.get(syntax);
  if (cached) return cached;

  const file = `schemas/${syntax}.json`;
  const result = contentModelSchema.safeParse(readJsonAsset(file));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid content model ${file}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(), {
      asset: file,
    });
  }
  documents.set(syntax, result.data);
  return result.data;
}

function resolveName(doc: ContentModelDocument, qualified: string): { name: string; namespace: string } {
  const separator = qualified.indexOf(':');
  return {
    name: qualified.slice(separator + 1),
    namespace: doc.namespaces[qualified.slice(0, separator)] ?? '',
  };
}

/**
 * Content model for a syntax at a given profile. Particles restricted to
 * other profiles are dropped, so their elements become unexpected.
 */
export function loadContentModel(syntax: Syntax, profile: InvoiceProfile): ContentModel {
  const key = `${syntax}:${profile}`;
  const cached = compiled.get(key);
  if (cached) return cached;

  const doc = loadDocument(syntax);
  const patterns = new Map(Object.entries(doc.values).map(([name, source]) => [name, new RegExp(source)]));

  const types = new Map<string, ParticleRule[]>();
  for (const [typeName, particles] of Object.entries(doc.types)) {
    types.set(
      typeName,
      particles
        .filter((particle) => particle.profiles === undefined || particle.profiles.includes(profile))
        .map((particle) => {
          const pattern = particle.value !== undefined ? patterns.get(particle.value) : undefined;
          return {
            ...resolveName(doc, particle.element),
            min: particle.min,
            max: particle.max === 'unbounded' ? Number.POSITIVE_INFINITY : particle.max,
            attributes: particle.attributes,
            ...(particle.type !== undefined ? { type: particle.type } : {}),
            ...(pattern !== undefined ? { pattern } : {}),
          };
        }),
    );
  }

  const model: ContentModel = {
    syntax,
    profile,
    roots: doc.roots.map((root) => ({ ...resolveName(doc, root.element), type: root.type })),
    types,
  };
  compiled.set(key, model);
  return model;
}
