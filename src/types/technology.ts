/**
 * Adoption Radar: Technology Types
 *
 * Static configuration for the tracked technologies.
 * Loaded once from config/technologies.json and never mutated.
 */

import { z } from 'zod';

// ============================================================
// ENUMS
// ============================================================

export const TechnologyCategorySchema = z.enum([
  'ai_platform',
  'ai_infrastructure',
  'vector_db',
  'ml_platform',
  'fintech_infrastructure',
  'trading_platform',
  'quant_tools',
  'trading_backtesting',
  'financial_data',
  'financial_ai',
  'trading_ai',
  'risk_compliance',
]);
export type TechnologyCategory = z.infer<typeof TechnologyCategorySchema>;

/** The two strategic lists compared against each other */
export const ListIdSchema = z.enum(['enterprise', 'fintech']);
export type ListId = z.infer<typeof ListIdSchema>;

// ============================================================
// TECHNOLOGY SPEC
// ============================================================

export const TechnologySpecSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().min(1),
  category: TechnologyCategorySchema,
  listMembership: ListIdSchema,
  githubRepo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'expected owner/repo').optional(),
  npmPackage: z.string().min(1).optional(),
  pypiPackage: z.string().min(1).optional(),
});
export type TechnologySpec = Readonly<z.infer<typeof TechnologySpecSchema>>;

// ============================================================
// TECHNOLOGY LIST
// ============================================================

export const TechnologyListSchema = z.object({
  id: ListIdSchema,
  name: z.string().min(1),
  description: z.string(),
  focus: z.string(),
  technologies: z.array(TechnologySpecSchema.omit({ listMembership: true })),
});

export interface TechnologyList {
  readonly id: ListId;
  readonly name: string;
  readonly description: string;
  readonly focus: string;
  readonly technologies: readonly TechnologySpec[];
}

/** Shape of config/technologies.json */
export const TechnologyCatalogSchema = z
  .object({
    lists: z.array(TechnologyListSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const listIds = new Set<string>();
    const seen = new Set<string>();
    for (const list of catalog.lists) {
      if (listIds.has(list.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['lists'],
          message: `Duplicate list id: ${list.id}`,
        });
      }
      listIds.add(list.id);
      for (const tech of list.technologies) {
        if (seen.has(tech.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate technology name: ${tech.name}`,
          });
        }
        seen.add(tech.name);
      }
    }
  });
