export interface MessageResponse {
  message: string;
}

export interface ErrorResponse {
  detail: string;
  statusCode: number;
  timestamp: string;
}
