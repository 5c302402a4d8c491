// src/core/config/graphql.config.ts
import { ConfigFactory } from '@nestjs/config';

const graphqlConfig: ConfigFactory = () => ({
  graphql: {
    schemaDestination: process.env.GRAPHQL_SCHEMA_FILE || 'src/schema.graphql',
    introspection: process.env.GRAPHQL_INTROSPECTION !== 'false',
    sortSchema: true,
  },
});

export default graphqlConfig;
