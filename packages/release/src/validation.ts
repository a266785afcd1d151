/**
 * fluxlint document validation
 * zod schemas for the documents a release bundle is made of
 */

import { z } from 'zod';
import { isPositiveDuration } from './duration.js';
import {
  DEFAULT_VALUES_KEY,
  HELM_RELEASE_API_VERSIONS,
  HELM_REPOSITORY_API_VERSIONS,
  SOURCE_REF_KINDS,
  type ConfigMapDocument,
  type HelmReleaseDocument,
  type HelmRepositoryDocument,
  type SecretDocument,
  type ValidationError,
  type ValidationResult,
  type ValuesNode,
  type ValuesTree,
} from './schema.js';

// =============================================================================
// Building Blocks
// =============================================================================

const SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const REPOSITORY_PROTOCOLS = ['http:', 'https:', 'oci:'];
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const metadataSchema = z
  .object({
    name: z
      .string({ required_error: 'name is required' })
      .min(1, 'name is required')
      .max(253, 'name must be at most 253 characters')
      .regex(SUBDOMAIN, 'name must be lowercase alphanumeric with hyphens or dots'),
    namespace: z
      .string({ required_error: 'namespace is required' })
      .min(1, 'namespace is required')
      .max(63, 'namespace must be at most 63 characters')
      .regex(LABEL, 'namespace must be lowercase alphanumeric with hyphens'),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

const durationSchema = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine(isPositiveDuration, `${field} must be a positive duration such as 10m or 1h30m`);

const valuesNodeSchema: z.ZodType<ValuesNode> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(valuesNodeSchema),
    z.record(valuesNodeSchema),
  ])
);

const valuesTreeSchema = z.record(valuesNodeSchema, {
  invalid_type_error: 'values must be a mapping',
});

// =============================================================================
// HelmRepository
// =============================================================================

const helmRepositorySchema = z
  .object({
    apiVersion: z.enum(HELM_REPOSITORY_API_VERSIONS),
    kind: z.literal('HelmRepository'),
    metadata: metadataSchema,
    spec: z
      .object({
        url: z
          .string({ required_error: 'url is required' })
          .refine(isRepositoryEndpoint, 'url must be an http, https or oci repository endpoint'),
        interval: durationSchema('interval'),
        type: z.enum(['default', 'oci']).optional(),
        timeout: durationSchema('timeout').optional(),
        suspend: z.boolean().optional(),
      })
      .passthrough(),
  })
  .passthrough()
  .superRefine((doc, ctx) => {
    if (doc.spec.url.startsWith('oci://') && doc.spec.type !== 'oci') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['spec', 'type'],
        message: 'type must be oci for oci:// repository urls',
      });
    }
  });

// =============================================================================
// HelmRelease
// =============================================================================

const valuesReferenceSchema = z
  .object({
    kind: z.enum(['Secret', 'ConfigMap'], {
      errorMap: () => ({ message: 'kind must be Secret or ConfigMap' }),
    }),
    name: z
      .string({ required_error: 'name is required' })
      .min(1, 'name is required')
      .regex(SUBDOMAIN, 'name must be lowercase alphanumeric with hyphens or dots'),
    valuesKey: z.string().min(1).default(DEFAULT_VALUES_KEY),
    targetPath: z.string().min(1).optional(),
    optional: z.boolean().default(false),
  })
  .passthrough();

const helmReleaseSchema = z
  .object({
    apiVersion: z.enum(HELM_RELEASE_API_VERSIONS),
    kind: z.literal('HelmRelease'),
    metadata: metadataSchema,
    spec: z
      .object({
        interval: durationSchema('interval'),
        chart: z.object({
          spec: z
            .object({
              chart: z.string({ required_error: 'chart is required' }).min(1, 'chart is required'),
              version: z.string().min(1).optional(),
              sourceRef: z.object({
                kind: z.enum(SOURCE_REF_KINDS, {
                  errorMap: () => ({
                    message: `kind must be one of: ${SOURCE_REF_KINDS.join(', ')}`,
                  }),
                }),
                name: z.string({ required_error: 'name is required' }).min(1, 'name is required'),
                namespace: z.string().min(1).optional(),
              }),
            })
            .passthrough(),
        }),
        releaseName: z.string().min(1).optional(),
        targetNamespace: z.string().min(1).optional(),
        suspend: z.boolean().optional(),
        valuesFrom: z.array(valuesReferenceSchema).default([]),
        values: valuesTreeSchema.default({}),
      })
      .passthrough(),
  })
  .passthrough();

// =============================================================================
// Secret / ConfigMap
// =============================================================================

const secretSchema = z
  .object({
    apiVersion: z.literal('v1'),
    kind: z.literal('Secret'),
    metadata: metadataSchema,
    data: z.record(z.string().regex(BASE64, 'data values must be base64 encoded')).optional(),
    stringData: z.record(z.string()).optional(),
  })
  .passthrough();

const configMapSchema = z
  .object({
    apiVersion: z.literal('v1'),
    kind: z.literal('ConfigMap'),
    metadata: metadataSchema,
    data: z.record(z.string()).optional(),
  })
  .passthrough();

// =============================================================================
// Public API
// =============================================================================

export function validateHelmRepository(raw: unknown): ValidationResult<HelmRepositoryDocument> {
  return toResult(helmRepositorySchema.safeParse(raw), raw);
}

export function validateHelmRelease(raw: unknown): ValidationResult<HelmReleaseDocument> {
  return toResult(helmReleaseSchema.safeParse(raw), raw);
}

export function validateSecret(raw: unknown): ValidationResult<SecretDocument> {
  return toResult(secretSchema.safeParse(raw), raw);
}

export function validateConfigMap(raw: unknown): ValidationResult<ConfigMapDocument> {
  return toResult(configMapSchema.safeParse(raw), raw);
}

export function validateValuesTree(raw: unknown): ValidationResult<ValuesTree> {
  return toResult(valuesTreeSchema.safeParse(raw), raw);
}

/**
 * Format a zod issue path as `spec.valuesFrom[1].kind`
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

export function toValidationErrors(error: z.ZodError, raw: unknown): ValidationError[] {
  return error.issues.map(issue => {
    const path = formatIssuePath(issue.path);
    const value = lookup(raw, issue.path);
    return value === undefined
      ? { path: path || '(root)', message: issue.message }
      : { path: path || '(root)', message: issue.message, value };
  });
}

function toResult<I, T>(parsed: z.SafeParseReturnType<I, T>, raw: unknown): ValidationResult<T> {
  if (parsed.success) {
    return { valid: true, errors: [], document: parsed.data };
  }
  return { valid: false, errors: toValidationErrors(parsed.error, raw) };
}

function isRepositoryEndpoint(url: string): boolean {
  if (!URL.canParse(url)) return false;
  const parsed = new URL(url);
  return REPOSITORY_PROTOCOLS.includes(parsed.protocol) && parsed.host !== '';
}

function lookup(raw: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = raw;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  // Only scalars are useful in messages
  return current !== null && typeof current === 'object' ? undefined : current;
}
