/**
 * GraphQL schema for the decision API
 *
 * query { isAllowed(input: { externalUserId, namespace, action, resource }) { result } }
 * query { errorCodes }
 */

import {
  GraphQLSchema,
  GraphQLObjectType,
  GraphQLInputObjectType,
  GraphQLNonNull,
  GraphQLString,
  GraphQLBoolean,
  GraphQLList,
} from 'graphql';
import { type } from 'arktype';
import type { AccessEngine, IsAllowedResult } from 'access-engine';
import type { CallerIdentity } from '../common/jwt.js';
import { formatGraphQLError, getAllErrorCodes, HttpError } from '../common/errors.js';
import { validateInput, isValidationFailure } from '../common/validation/arktype.js';
import { AUTHZ_ERRORS } from '../error-codes.js';

export type GatewayContext = {
  caller: CallerIdentity;
  correlationId?: string;
};

const isAllowedInputSchema = type({
  externalUserId: 'string',
  namespace: 'string',
  action: 'string',
  resource: 'string',
});

const IsAllowedInputType = new GraphQLInputObjectType({
  name: 'IsAllowedInput',
  fields: {
    externalUserId: { type: new GraphQLNonNull(GraphQLString) },
    namespace: { type: new GraphQLNonNull(GraphQLString) },
    action: { type: new GraphQLNonNull(GraphQLString) },
    resource: { type: new GraphQLNonNull(GraphQLString) },
  },
});

const IsAllowedResultType = new GraphQLObjectType<IsAllowedResult>({
  name: 'IsAllowedResult',
  fields: {
    result: { type: new GraphQLNonNull(GraphQLBoolean) },
  },
});

export function createGraphQLSchema(engine: AccessEngine): GraphQLSchema {
  const QueryType = new GraphQLObjectType<unknown, GatewayContext>({
    name: 'Query',
    fields: {
      isAllowed: {
        type: new GraphQLNonNull(IsAllowedResultType),
        args: {
          input: { type: new GraphQLNonNull(IsAllowedInputType) },
        },
        resolve: async (_source, args: Record<string, unknown>, ctx): Promise<IsAllowedResult> => {
          try {
            const input = validateInput(isAllowedInputSchema(args.input));
            if (isValidationFailure(input)) {
              throw new HttpError(422, AUTHZ_ERRORS.ValidationError, input.errors.join('; '));
            }
            return await engine.isAllowed(input);
          } catch (error) {
            throw formatGraphQLError(error, { correlationId: ctx.correlationId });
          }
        },
      },
      errorCodes: {
        type: new GraphQLNonNull(new GraphQLList(new GraphQLNonNull(GraphQLString))),
        resolve: () => getAllErrorCodes(),
      },
    },
  });

  return new GraphQLSchema({ query: QueryType });
}
