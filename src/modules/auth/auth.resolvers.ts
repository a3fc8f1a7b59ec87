import { type FieldRegistration, unwrap } from "../../graphql/registry.js";

export const authResolvers: FieldRegistration[] = [
  {
    type: "Mutation",
    field: "register",
    resolve(_source, args, context) {
      return unwrap(context.services.auth.register(args.input));
    },
  },
  {
    type: "Mutation",
    field: "login",
    async resolve(_source, args, context) {
      const session = await unwrap(context.services.auth.login(args.input));
      return session.token;
    },
  },
];
