import { z } from 'zod';
import { controlCommands, reportableControlStatuses } from './schema';
import { DECISION_ACTIONS, DETECTION_STATUSES } from './decisionEngine';

export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  notFound: z.object({
    message: z.string(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

// blank messages fall back to the endpoint's default text
const optionalMessage = z
  .string()
  .trim()
  .max(500)
  .transform((message) => message || undefined)
  .optional();

const controlResponseSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('MANUAL'),
    command: z.enum(controlCommands),
    status: z.literal('PENDING'),
    message: z.string().nullable(),
    timestamp: z.string(),
  }),
  z.object({
    mode: z.literal('AUTO'),
    action: z.union([z.enum(controlCommands), z.enum(DECISION_ACTIONS)]),
    status: z.literal('AUTO'),
    message: z.string(),
    timestamp: z.string(),
  }),
]);

const controlRecordSchema = z.object({
  success: z.literal(true),
  deviceCode: z.string(),
  command: z.enum(controlCommands),
  status: z.string(),
  message: z.string().nullable(),
  timestamp: z.string(),
});

export const api = {
  health: {
    method: 'GET' as const,
    path: '/api/health',
    responses: { 200: z.object({ status: z.literal('healthy'), timestamp: z.string() }) },
  },
  metrics: {
    method: 'GET' as const,
    path: '/api/metrics',
  },
  device: {
    info: {
      method: 'GET' as const,
      path: '/api/device/info',
    },
    upload: {
      method: 'POST' as const,
      path: '/api/upload',
      // JSON variant; raw image/* bodies carry capturedAt in X-Captured-At
      input: z.object({
        image: z.string().min(1),
        capturedAt: z.string().optional(),
      }),
      responses: {
        202: z.object({
          success: z.literal(true),
          message: z.string(),
          action: z.literal('SLEEP'),
          status: z.literal('PROCESSING'),
          deviceCode: z.string(),
          imageId: z.string(),
          totalTarget: z.literal(0),
          totalObjects: z.literal(0),
        }),
      },
    },
    latestInference: {
      method: 'GET' as const,
      path: '/api/device/:deviceCode/inference/latest',
    },
    alerts: {
      method: 'GET' as const,
      path: '/api/device/:deviceCode/alerts',
      input: z.object({
        open: z.enum(['true', 'false']).optional(),
      }),
    },
  },
  control: {
    poll: {
      method: 'GET' as const,
      path: '/api/device/:deviceCode/control',
      responses: { 200: controlResponseSchema },
    },
    set: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/control',
      input: z.object({
        command: z.enum(controlCommands),
        message: optionalMessage,
      }),
      responses: { 200: controlRecordSchema },
    },
    activateServo: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/activate_servo',
      input: z.object({ message: optionalMessage }),
    },
    stopServo: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/stop_servo',
      input: z.object({ message: optionalMessage }),
    },
    report: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/control/status',
      input: z.object({
        status: z.enum(reportableControlStatuses),
        message: optionalMessage,
      }),
      responses: { 200: controlRecordSchema, 404: errorSchemas.notFound },
    },
    executed: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/control/executed',
      input: z.object({ message: optionalMessage }),
    },
    failed: {
      method: 'POST' as const,
      path: '/api/device/:deviceCode/control/failed',
      input: z.object({ message: optionalMessage }),
    },
    status: {
      method: 'GET' as const,
      path: '/api/device/:deviceCode/control/status',
    },
    reset: {
      method: 'DELETE' as const,
      path: '/api/device/:deviceCode/control',
      responses: { 200: z.object({ success: z.literal(true), deleted: z.boolean() }) },
    },
  },
};

export const detectionStatusSchema = z.enum(DETECTION_STATUSES);

export function buildUrl(path: string, params?: Record<string, string | number>): string {
  let url = path;
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (url.includes(`:${key}`)) {
        url = url.replace(`:${key}`, encodeURIComponent(String(value)));
      }
    });
  }
  return url;
}

export type ControlResponse = z.infer<typeof controlResponseSchema>;
export type ControlRecordResponse = z.infer<typeof controlRecordSchema>;
