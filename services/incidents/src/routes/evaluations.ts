import type { FastifyInstance } from 'fastify';
import { parseEvaluatorId, parseSubmissionPayload } from '../schemas/requests';
import type { IncidentService } from '../services/incidentService';
import { buildOperationContext, ensureScope } from './helpers';
import { serializeNextAssignment } from './serializers';

export async function registerEvaluationRoutes(app: FastifyInstance, service: IncidentService): Promise<void> {
  app.get('/evaluations/categories', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    return { categories: service.listEvaluationCategories() };
  });

  app.get<{ Params: { evaluatorId: string } }>(
    '/evaluations/assignments/next/:evaluatorId',
    async (request, reply) => {
      if (!ensureScope(request, reply, 'evaluations:write')) {
        return;
      }
      const evaluatorId = parseEvaluatorId(request.params.evaluatorId);
      const assignment = await service.nextAssignment(evaluatorId);
      return serializeNextAssignment(assignment);
    }
  );

  app.post('/evaluations/submit', async (request, reply) => {
    if (!ensureScope(request, reply, 'evaluations:write')) {
      return;
    }
    const submission = parseSubmissionPayload(request.body);
    const outcome = await service.submitHumanEvaluation(submission, buildOperationContext(request));

    if (outcome.status === 'not_found_or_already_complete') {
      reply.code(409).send({
        statusCode: 409,
        error: 'not_found_or_already_complete',
        message: 'No pending assignment matches this evaluation'
      });
      return;
    }

    return {
      status: 'success',
      message: 'Evaluation submitted',
      assignment_id: outcome.assignmentId,
      evaluation_id: outcome.evaluationId
    };
  });
}
