export type User = {
  id: number;
  name: string;
  /** RFC 3339 UTC timestamp. */
  createdAt: string;
};

export type CreateUserRequest = {
  name?: string | null;
};

export type UserListing = {
  items: User[];
  count: number;
};

export type UserDeleted = {
  deleted: true;
  id: number;
};

export type UserProfileStub = {
  id: number;
  profile: true;
};

export type UserOrderRef = {
  id: number;
  orderId: string;
};

export type ErrorCode =
  | 'validation_failed'
  | 'not_found'
  | 'invalid_json'
  | 'invalid_path'
  | 'method_not_allowed'
  | 'internal_error';

export type ErrorBody = {
  error: ErrorCode;
  message: string;
  details?: unknown;
};

export type MethodNotAllowedDetails = {
  method: string;
  allow: string[];
};

export type NotFoundDetails = {
  path: string;
};

export type ServiceBanner = {
  service: string;
  routes: string[];
};

export type HealthResponse = {
  status: 'ok';
};

export type TimeResponse = {
  time: string;
};

export type EchoResponse = {
  name: string;
};

export type ArithmeticRequest = {
  a?: number | null;
  b?: number | null;
};

export type ArithmeticResponse = {
  result: number;
};
