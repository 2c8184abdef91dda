import {
  FastifyError,
  FastifyPluginAsync,
  FastifyReply,
  FastifyRequest,
} from "fastify";
import fp from "fastify-plugin";
import {
  BaseError,
  InternalServerError,
  NotFoundError,
  RequestError,
  ValidationError,
} from "../errors/index.js";

const errorHandlerPlugin: FastifyPluginAsync = async (fastify, _options) => {
  fastify.setErrorHandler(
    (err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      let finalErr: BaseError;
      if (err instanceof BaseError) {
        finalErr = err;
      } else if (err.validation) {
        finalErr = new ValidationError({ message: err.message });
      } else if (err.statusCode !== undefined && err.statusCode < 500) {
        finalErr = new RequestError({
          message: err.message,
          httpStatusCode: err.statusCode,
        });
      } else {
        request.log.error(err);
        finalErr = new InternalServerError();
      }
      if (finalErr.httpStatusCode >= 500) {
        request.log.error(
          { errName: finalErr.name, errorId: finalErr.id },
          finalErr.toString(),
        );
      } else {
        request.log.info(
          { errName: finalErr.name, errorId: finalErr.id },
          finalErr.message,
        );
      }
      return reply.status(finalErr.httpStatusCode).send(finalErr.toJson());
    },
  );
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const err = new NotFoundError({ endpointName: request.url });
    return reply.status(err.httpStatusCode).send(err.toJson());
  });
};

export default fp(errorHandlerPlugin);
