/**
 * Response utilities for standardized API responses
 */

import type { ApiResponse } from '@lazarus/core';

/**
 * Create a standard success response
 */
export function success<T>(data: T): ApiResponse<T> {
  return { data, success: true };
}

/**
 * Create a resource created response (includes message)
 */
export function created<T>(data: T, resource: string): ApiResponse<T> & { message: string } {
  return {
    data,
    success: true,
    message: `${resource} created successfully`,
  };
}

/**
 * Create a resource updated response (includes message)
 */
export function updated<T>(data: T, resource: string): ApiResponse<T> & { message: string } {
  return {
    data,
    success: true,
    message: `${resource} updated successfully`,
  };
}

/**
 * Create a deletion response
 */
export function deleted<T>(data: T, resource: string): ApiResponse<T> & { message: string } {
  return {
    data,
    success: true,
    message: `${resource} deleted successfully`,
  };
}
