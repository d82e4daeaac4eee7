/**
 * Shapes of the GoHighLevel v1 responses we read. Unknown keys pass through so that
 * the update payload can be rebuilt from the opportunity as fetched.
 */
import { z } from 'zod';

const customFieldSchema = z
  .object({
    id: z.string().nullish(),
    key: z.string().nullish(),
    value: z.unknown().optional(),
    fieldValue: z.unknown().optional(),
  })
  .passthrough();

const contactSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
  })
  .passthrough();

export const ghlOpportunitySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().nullish(),
    monetaryValue: z.union([z.number(), z.string()]).nullish(),
    pipelineId: z.string().nullish(),
    pipelineStageId: z.string().nullish(),
    status: z.string().nullish(),
    contact: contactSchema.nullish(),
    customFields: z.array(customFieldSchema).nullish(),
  })
  .passthrough();

export type GhlOpportunity = z.infer<typeof ghlOpportunitySchema>;

export const ghlPipelinesResponseSchema = z.object({
  pipelines: z
    .array(
      z
        .object({
          id: z.string().min(1),
          name: z.string().nullish(),
        })
        .passthrough()
    )
    .default([]),
});

export type GhlPipeline = z.infer<typeof ghlPipelinesResponseSchema>['pipelines'][number];

export const ghlOpportunityPageSchema = z.object({
  opportunities: z.array(ghlOpportunitySchema).default([]),
  meta: z
    .object({
      total: z.number().nullish(),
      startAfterId: z.string().nullish(),
      startAfter: z.number().nullish(),
      nextPageUrl: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
});

export type GhlOpportunityPage = z.infer<typeof ghlOpportunityPageSchema>;
