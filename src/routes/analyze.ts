import { FastifyPluginAsync } from "fastify";
import { FastifyZodOpenApiTypeProvider } from "fastify-zod-openapi";
import { analyzeGrades } from "../functions/analyze.js";
import { ValidationError } from "../errors/index.js";
import {
  analyzeRequestSchema,
  errorResponseSchema,
  gradeAnalysisSchema,
} from "../types/stats.js";

export type AnalyzeRoutesOptions = {
  defaultBucketCount: number;
  maxInputLength: number;
};

const analyzeRoutes: FastifyPluginAsync<AnalyzeRoutesOptions> = async (
  fastify,
  { defaultBucketCount, maxInputLength },
) => {
  fastify.withTypeProvider<FastifyZodOpenApiTypeProvider>().post(
    "/analyze",
    {
      schema: {
        body: analyzeRequestSchema,
        response: {
          200: gradeAnalysisSchema,
          400: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { grades, buckets } = request.body;
      if (grades.length > maxInputLength) {
        throw new ValidationError({
          message: `Grades input must be at most ${maxInputLength} characters.`,
        });
      }
      const bucketCount = buckets ?? defaultBucketCount;
      const analysis = analyzeGrades({
        text: grades,
        bucketCount,
        logger: request.log,
      });
      request.log.info(
        {
          count: analysis.stats.count,
          ignoredCount: analysis.ignoredCount,
          bucketCount: analysis.histogram.buckets.length,
        },
        "Analyzed grades",
      );
      return reply.send(analysis);
    },
  );
};

export default analyzeRoutes;
