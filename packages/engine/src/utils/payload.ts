import { z } from 'zod';
import { ArtifactPayload } from '../types';

/**
 * Any JSON value.
 */
export const artifactPayloadSchema: z.ZodType<ArtifactPayload> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(artifactPayloadSchema), z.record(artifactPayloadSchema)]),
);
