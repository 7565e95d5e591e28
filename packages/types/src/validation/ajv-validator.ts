/**
 * JSON Schema validation for the daily report, applied before a report leaves the
 * process (CLI output, cache writes).
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import type { DailyReport } from '../types/report.js';

const SCHEMA = {
  "$schema": "http://json-schema.org/draft-07/schema#",
  "$id": "https://example.local/schemas/daily-coverage-report.schema.json",
  "title": "Daily Coverage Report",
  "type": "object",
  "additionalProperties": false,
  "required": [
    "userId", "date", "timezone", "window", "currency", "totals", "spends", "earns",
    "holdsExcluded", "transactionSetHash", "renderedText", "renderError"
  ],
  "properties": {
    "userId": { "type": "string", "minLength": 1 },
    "date": { "$ref": "#/definitions/isoDate" },
    "timezone": { "type": "string", "minLength": 1 },
    "window": {
      "type": "object",
      "additionalProperties": false,
      "required": ["date", "timezone", "start", "end"],
      "properties": {
        "date": { "$ref": "#/definitions/isoDate" },
        "timezone": { "type": "string" },
        "start": { "type": "integer" },
        "end": { "type": "integer" }
      }
    },
    "currency": {
      "anyOf": [
        {
          "type": "object",
          "additionalProperties": false,
          "required": ["code", "name", "symbol", "flag"],
          "properties": {
            "code": { "type": "integer", "minimum": 0 },
            "name": { "type": "string" },
            "symbol": { "type": "string" },
            "flag": { "type": "string" }
          }
        },
        { "type": "null" }
      ]
    },
    "totals": {
      "type": "object",
      "additionalProperties": false,
      "required": ["spendTotal", "earnTotal", "net"],
      "properties": {
        "spendTotal": { "type": "integer", "minimum": 0 },
        "earnTotal": { "type": "integer", "minimum": 0 },
        "net": { "type": "integer" }
      }
    },
    "spends": { "type": "array", "items": { "$ref": "#/definitions/spend" } },
    "earns": { "type": "array", "items": { "$ref": "#/definitions/earn" } },
    "holdsExcluded": { "type": "integer", "minimum": 0 },
    "transactionSetHash": { "type": "string", "pattern": "^[a-f0-9]{64}$" },
    "renderedText": { "type": ["string", "null"] },
    "renderError": { "type": ["string", "null"] }
  },
  "definitions": {
    "isoDate": { "type": "string", "pattern": "^\\d{4}-\\d{2}-\\d{2}$" },
    "source": {
      "type": "object",
      "additionalProperties": false,
      "required": ["txId", "amount"],
      "properties": {
        "txId": { "type": "string", "minLength": 1 },
        "amount": { "type": "integer", "minimum": 1 }
      }
    },
    "spend": {
      "type": "object",
      "additionalProperties": false,
      "required": [
        "txId", "accountId", "time", "description", "amount", "covered",
        "coveredAmount", "uncoveredAmount", "sources", "reason"
      ],
      "properties": {
        "txId": { "type": "string", "minLength": 1 },
        "accountId": { "type": "string", "minLength": 1 },
        "time": { "type": "integer" },
        "description": { "type": "string" },
        "amount": { "type": "integer", "minimum": 1 },
        "covered": { "type": "boolean" },
        "coveredAmount": { "type": "integer", "minimum": 0 },
        "uncoveredAmount": { "type": "integer", "minimum": 0 },
        "sources": { "type": "array", "items": { "$ref": "#/definitions/source" } },
        "reason": { "enum": ["insufficient_income", null] }
      }
    },
    "earn": {
      "type": "object",
      "additionalProperties": false,
      "required": ["txId", "accountId", "time", "description", "amount", "allocated", "remaining"],
      "properties": {
        "txId": { "type": "string", "minLength": 1 },
        "accountId": { "type": "string", "minLength": 1 },
        "time": { "type": "integer" },
        "description": { "type": "string" },
        "amount": { "type": "integer", "minimum": 1 },
        "allocated": { "type": "integer", "minimum": 0 },
        "remaining": { "type": "integer", "minimum": 0 }
      }
    }
  }
} as const;

export interface ReportValidationResult {
  valid: boolean;
  errors: ReportValidationIssue[];
}

export interface ReportValidationIssue {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

function toIssue(err: ErrorObject): ReportValidationIssue {
  return {
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  };
}

export function validateReport(report: unknown): ReportValidationResult {
  const validate = getValidator();
  if (validate(report)) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: (validate.errors ?? []).map(toIssue) };
}

export function validateReportOrThrow(report: unknown): asserts report is DailyReport {
  const result = validateReport(report);
  if (!result.valid) {
    const lines = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Report schema validation failed:\n${lines}`);
  }
}
