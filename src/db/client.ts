import { DynamoDB } from 'aws-sdk';

/**
 * DocumentClient options for the snapshot table.
 * DYNAMODB_ENDPOINT points the client at a local DynamoDB.
 */
const dynamoDbConfig: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
  region: process.env.AWS_REGION || 'us-east-1',
  ...(process.env.DYNAMODB_ENDPOINT && {
    endpoint: process.env.DYNAMODB_ENDPOINT
  })
};

/**
 * Shared DocumentClient used by the snapshot store
 */
export const documentClient = new DynamoDB.DocumentClient(dynamoDbConfig);
