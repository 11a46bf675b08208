/**
 * Error types and error codes for numa-irq-top
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  CONFIGURATION_ERROR = 1001,

  // Topology errors (2000-2999)
  TOPOLOGY_TOOL_NOT_INSTALLED = 2000,
  TOPOLOGY_FILE_NOT_FOUND = 2001,
  TOPOLOGY_FILE_UNREADABLE = 2002,
  TOPOLOGY_COMMAND_FAILED = 2003,
  TOPOLOGY_PARSE_ERROR = 2004,
  TOPOLOGY_UNMAPPED_CPU = 2005,

  // Counter source errors (3000-3999)
  COUNTER_SOURCE_UNREADABLE = 3000,
  COUNTER_HEADER_INVALID = 3001,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
