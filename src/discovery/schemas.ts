import { z } from 'zod';

// GraphQL connections may return null for any nullable node or edge.

const graphqlErrorSchema = z.object({ message: z.string() }).passthrough();

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphqlErrorSchema).optional(),
});

const pageInfoSchema = z
  .object({
    hasNextPage: z.boolean(),
    endCursor: z.string().nullish(),
  })
  .nullish();

const accountNodeSchema = z.object({
  id: z.string(),
  businessName: z.string().nullish(),
});

export const accountsDataSchema = z.object({
  me: z
    .object({
      accounts: z
        .object({
          pageInfo: pageInfoSchema,
          edges: z.array(z.object({ node: accountNodeSchema.nullish() }).nullish()),
        })
        .nullish(),
    })
    .nullish(),
});

const zoneNodeSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  isPaired: z.boolean().nullish(),
});

const locationNodeSchema = z.object({
  id: z.string(),
  soundZones: z
    .object({
      edges: z.array(z.object({ node: zoneNodeSchema.nullish() }).nullish()),
    })
    .nullish(),
});

export const accountZonesDataSchema = z.object({
  account: z
    .object({
      locations: z
        .object({
          pageInfo: pageInfoSchema,
          edges: z.array(z.object({ node: locationNodeSchema.nullish() }).nullish()),
        })
        .nullish(),
    })
    .nullish(),
});

export const zoneStatusDataSchema = z.object({
  soundZone: z
    .object({
      id: z.string(),
      name: z.string().nullish(),
      isPaired: z.boolean().nullish(),
      online: z.boolean().nullish(),
      device: z.object({ id: z.string(), name: z.string().nullish() }).nullish(),
      subscription: z.object({ isActive: z.boolean().nullish() }).nullish(),
    })
    .nullish(),
});

export type GraphQLErrorEntry = z.infer<typeof graphqlErrorSchema>;
export type AccountsData = z.infer<typeof accountsDataSchema>;
export type AccountZonesData = z.infer<typeof accountZonesDataSchema>;
export type PageInfo = z.infer<typeof pageInfoSchema>;
export type ZoneStatusData = z.infer<typeof zoneStatusDataSchema>;
