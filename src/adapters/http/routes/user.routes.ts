import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import type { UserService } from '../../../application/services/user-service.js';
import { toUserResponse } from '../presenters/user.presenter.js';

export interface UserRoutesOptions {
  userService: UserService;
}

function requestIdOf(request: FastifyRequest): string {
  return request.requestContext.get('requestId') ?? request.id;
}

/**
 * Rotas CRUD de /users
 *
 * Headers x-api-key, authorization, x-user-id e content-type são aceitos
 * mas não validados: a API não faz autenticação.
 */
export const userRoutes: FastifyPluginAsync<UserRoutesOptions> = async (fastify, opts) => {
  const { userService } = opts;

  fastify.post('/users', async (request, reply) => {
    const user = await userService.createUser(request.body, requestIdOf(request));
    return reply.code(201).send(toUserResponse(user));
  });

  fastify.get('/users', async (request) => {
    const users = await userService.listUsers(request.query, requestIdOf(request));
    return users.map(toUserResponse);
  });

  fastify.get('/users/search/:term', async (request) => {
    const users = await userService.searchUsers(request.params, requestIdOf(request));
    return users.map(toUserResponse);
  });

  fastify.get('/users/:id', async (request) => {
    const user = await userService.getUser(request.params, requestIdOf(request));
    return toUserResponse(user);
  });

  fastify.put('/users/:id', async (request) => {
    const user = await userService.replaceUser(request.params, request.body, requestIdOf(request));
    return toUserResponse(user);
  });

  fastify.patch('/users/:id', async (request) => {
    const user = await userService.partialUpdateUser(request.params, request.body, requestIdOf(request));
    return toUserResponse(user);
  });

  fastify.delete('/users/:id', async (request, reply) => {
    await userService.deleteUser(request.params, requestIdOf(request));
    return reply.code(204).send();
  });
};
