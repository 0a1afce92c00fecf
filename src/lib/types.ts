import { z } from "zod";

// Operation kinds accepted from the offline client
export const operationKindSchema = z.enum(["sale", "stockPurchase", "cashOutflow"]);
export type OperationKind = z.infer<typeof operationKindSchema>;

// User
export interface User {
  id: string;
  name: string | null;
  createdAt: Date;
}

// An operation as recorded by the server, keyed by the client's localId
export interface ReceivedOperation {
  id: number;
  localId: string;
  kind: OperationKind;
  userId: string;
  payload: unknown;
  receivedAt: Date;
}

// Auth context attached to requests
export interface AuthContext {
  userId: string;
  user: User;
}
