/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Tool handlers convert every caught value into an MCPError response.
 *
 * @module server/errors
 */

import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/types.js';
import { ExtractionError } from '../services/extraction/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ALREADY_EXISTS'

  // Hierarchy lookups
  | 'STATE_NOT_FOUND'
  | 'LGA_NOT_FOUND'

  // Extraction errors
  | 'UNREADABLE_SOURCE'
  | 'EXTRACTION_ABORTED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_FILE_TYPE'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 *
 * DatabaseError and ExtractionError subclasses carry a `.code` that is more
 * specific than their name and are resolved in fromUnknown() first.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  DatabaseError: 'INTERNAL_ERROR',
  MigrationError: 'INTERNAL_ERROR',
  UnreadableSourceError: 'UNREADABLE_SOURCE',
  ExtractionAbortedError: 'EXTRACTION_ABORTED',
};

const DATABASE_CODE_TO_CATEGORY: Partial<Record<DatabaseErrorCode, ErrorCategory>> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.STATE_NOT_FOUND]: 'STATE_NOT_FOUND',
  [DatabaseErrorCode.LGA_NOT_FOUND]: 'LGA_NOT_FOUND',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
};

function categoryFor(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  if (error instanceof DatabaseError) {
    return DATABASE_CODE_TO_CATEGORY[error.code] ?? 'INTERNAL_ERROR';
  }
  if (error instanceof ExtractionError) {
    return error.code;
  }
  return ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = categoryFor(error, defaultCategory);
      const code =
        error instanceof DatabaseError || error instanceof ExtractionError ? error.code : undefined;
      const details = error instanceof ExtractionError ? error.details : undefined;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(details && { errorDetails: details }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'boundary_health_check',
    hint: 'Check parameter types and required fields',
  },
  DATABASE_NOT_FOUND: {
    tool: 'boundary_db_list',
    hint: 'Use boundary_db_list to see available databases',
  },
  DATABASE_NOT_SELECTED: {
    tool: 'boundary_db_select',
    hint: 'Use boundary_db_list to find database names, then boundary_db_select',
  },
  DATABASE_ALREADY_EXISTS: { tool: 'boundary_db_list', hint: 'Choose a unique database name' },
  STATE_NOT_FOUND: {
    tool: 'boundary_state_list',
    hint: 'Use boundary_state_list to find valid state IDs',
  },
  LGA_NOT_FOUND: {
    tool: 'boundary_lga_list',
    hint: 'Use boundary_lga_list with a state_id to find valid LGA IDs',
  },
  UNREADABLE_SOURCE: {
    tool: 'boundary_extraction_logs',
    hint: 'The PDF could not be parsed; check that it is not encrypted or image-only',
  },
  EXTRACTION_ABORTED: {
    tool: 'boundary_extract_pdf',
    hint: 'The run was cancelled; start the extraction again',
  },
  PATH_NOT_FOUND: {
    tool: 'boundary_extract_pdf',
    hint: 'Verify the file path exists on the filesystem',
  },
  FILE_TOO_LARGE: {
    tool: 'boundary_config_set',
    hint: 'Split the PDF or raise max_file_size_mb via boundary_config_set',
  },
  UNSUPPORTED_FILE_TYPE: {
    tool: 'boundary_extract_pages',
    hint: 'Only .pdf files are read; pass pre-extracted tables to boundary_extract_pages',
  },
  CONFIGURATION_ERROR: {
    tool: 'boundary_config_get',
    hint: 'Check BOUNDARY_EXTRACTOR_* environment variables and boundary_config_get output',
  },
  INTERNAL_ERROR: {
    tool: 'boundary_health_check',
    hint: 'Run boundary_health_check for diagnostics',
  },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database selected. Use boundary_db_list to see available databases, then boundary_db_select to choose one.'
  );
}

export function databaseNotFoundError(name: string, storagePath?: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Database "${name}" not found`, {
    databaseName: name,
    storagePath,
  });
}

export function databaseAlreadyExistsError(name: string): MCPError {
  return new MCPError('DATABASE_ALREADY_EXISTS', `Database "${name}" already exists`, {
    databaseName: name,
  });
}

export function stateNotFoundError(stateId: number): MCPError {
  return new MCPError(
    'STATE_NOT_FOUND',
    `State not found: ${stateId}. Use boundary_state_list to browse extracted states.`,
    { stateId }
  );
}

export function lgaNotFoundError(lgaId: number): MCPError {
  return new MCPError(
    'LGA_NOT_FOUND',
    `LGA not found: ${lgaId}. Use boundary_lga_list to browse LGAs of a state.`,
    { lgaId }
  );
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
