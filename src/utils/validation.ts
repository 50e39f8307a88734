import { z } from 'zod';

const optionalNumber = z.number().nullable().optional().catch(null);
const optionalText = z.string().nullable().optional().catch(null);

// OpenWeather "current weather" payload; only the fields the planner reads.
export const OpenWeatherCurrentSchema = z.object({
  cod: z.union([z.number(), z.string()]).optional(),
  message: z.string().optional(),
  name: optionalText,
  dt: optionalNumber,
  timezone: optionalNumber,
  weather: z
    .array(
      z.object({
        main: optionalText,
        description: optionalText,
      }),
    )
    .optional()
    .default([]),
  main: z
    .object({
      temp: optionalNumber,
      feels_like: optionalNumber,
      temp_min: optionalNumber,
      temp_max: optionalNumber,
      humidity: optionalNumber,
      pressure: optionalNumber,
    })
    .optional(),
  wind: z
    .object({
      speed: optionalNumber,
      deg: optionalNumber,
    })
    .optional(),
  clouds: z.object({ all: optionalNumber }).optional(),
  sys: z.object({ country: optionalText }).optional(),
});

export const NominatimSearchSchema = z.array(
  z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
    display_name: z.string().optional(),
  }),
);

export const NominatimReverseSchema = z.object({
  error: z.string().optional(),
  address: z
    .object({
      city: z.string(),
      town: z.string(),
      village: z.string(),
      hamlet: z.string(),
      municipality: z.string(),
      county: z.string(),
      state_district: z.string(),
      country: z.string(),
    })
    .partial()
    .optional(),
});

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1, 'At least one choice must be returned'),
});

export type OpenWeatherCurrentPayload = z.infer<typeof OpenWeatherCurrentSchema>;
export type NominatimSearchPayload = z.infer<typeof NominatimSearchSchema>;
export type NominatimReversePayload = z.infer<typeof NominatimReverseSchema>;
export type ChatCompletionPayload = z.infer<typeof ChatCompletionSchema>;

export const formatZodIssues = (error: z.ZodError, context?: string): string => {
  const issues = error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
  return context ? `${context}: ${issues}` : issues;
};
