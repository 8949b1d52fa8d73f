// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

// Does not exist in @opentelemetry/semantic-conventions
export const SERVER_SOCKET_ADDRESS: string = 'server.socket.address';
export const SERVER_SOCKET_PORT: string = 'server.socket.port';
export const NET_SOCK_PEER_ADDR: string = 'net.sock.peer.addr';
export const NET_SOCK_PEER_PORT: string = 'net.sock.peer.port';

// Alternatively, `import { AttributeNames } from '@opentelemetry/instrumentation-graphql/build/src/enums/AttributeNames';`
//   AttributeNames.OPERATION_TYPE
export const GRAPHQL_OPERATION_TYPE: string = 'graphql.operation.type';

// TODO: Use Semantic Conventions once the gen_ai attributes leave the incubating entry point
export const GEN_AI_REQUEST_MODEL: string = 'gen_ai.request.model';
