import { z } from 'zod';
import type { CareRole, MemberProfile } from '../types/index.js';

/**
 * Supported language-model backends.
 */
export const LLM_PROVIDERS = ['openrouter', 'local'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

const memberProfileSchema = z.object({
  name: z.string().min(1),
  age: z.number().int().positive(),
  goals: z.array(z.string()),
  personality: z.string(),
  healthConditions: z.array(z.string()),
});

const careTeamMemberSchema = z.object({
  name: z.string().min(1).optional(),
  persona: z.string().min(1).optional(),
});

const positiveDays = z.number().positive();

/**
 * Simulation configuration file schema.
 *
 * This is what gets loaded from data/config/simulation.json.
 * All fields are optional - defaults are used for missing values.
 */
export const configFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive(),

    simulation: z
      .object({
        horizonDays: positiveDays.optional(),
        /** ISO date of simulated day 0 */
        startDate: z.string().optional(),
        seed: z.number().int().nonnegative().nullable().optional(),
        onboardingDays: positiveDays.optional(),
      })
      .optional(),

    schedule: z
      .object({
        diagnosticIntervalDays: positiveDays.optional(),
        exerciseRefreshDays: positiveDays.optional(),
        travelHomeDays: positiveDays.optional(),
        travelAwayDays: positiveDays.optional(),
        wearableRefreshDays: positiveDays.optional(),
        healthCheckStartDelayDays: z.number().nonnegative().optional(),
        wellnessCheckDays: positiveDays.optional(),
        nutritionReviewDays: positiveDays.optional(),
        strategicReviewDays: positiveDays.optional(),
      })
      .optional(),

    member: z
      .object({
        profile: memberProfileSchema.optional(),
        persona: z.string().optional(),
        meanDaysBetweenActions: positiveDays.optional(),
        adherenceProbability: z.number().min(0).max(1).optional(),
      })
      .optional(),

    careTeam: z
      .object({
        logistics: careTeamMemberSchema.optional(),
        physician: careTeamMemberSchema.optional(),
        data: careTeamMemberSchema.optional(),
        nutrition: careTeamMemberSchema.optional(),
        movement: careTeamMemberSchema.optional(),
        leadership: careTeamMemberSchema.optional(),
      })
      .optional(),

    travel: z
      .object({
        locations: z.array(z.string().min(1)).min(1).optional(),
        homeLocation: z.string().min(1).optional(),
      })
      .optional(),

    llm: z
      .object({
        enabled: z.boolean().optional(),
        provider: z.enum(LLM_PROVIDERS).optional(),
        model: z.string().optional(),
        local: z
          .object({
            baseUrl: z.string().optional(),
            model: z.string().optional(),
          })
          .optional(),
        timeoutMs: z.number().int().positive().optional(),
        maxRetries: z.number().int().nonnegative().optional(),
      })
      .optional(),

    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
        pretty: z.boolean().optional(),
      })
      .optional(),
  })
  .partial({ version: true });

export type SimulationConfigFile = z.infer<typeof configFileSchema>;

/**
 * One care-team responder.
 */
export interface CareTeamMember {
  name: string;
  persona: string;
}

/**
 * Merged application configuration.
 *
 * Final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables
 */
export interface MergedConfig {
  simulation: {
    horizonDays: number;
    startDate: string;
    /** null = draw a fresh seed per run */
    seed: number | null;
    onboardingDays: number;
  };

  /** Periodic intervals, all in simulated days */
  schedule: {
    diagnosticIntervalDays: number;
    exerciseRefreshDays: number;
    travelHomeDays: number;
    travelAwayDays: number;
    wearableRefreshDays: number;
    healthCheckStartDelayDays: number;
    wellnessCheckDays: number;
    nutritionReviewDays: number;
    strategicReviewDays: number;
  };

  member: {
    profile: MemberProfile;
    persona: string;
    /** Mean of the exponential delay between member actions */
    meanDaysBetweenActions: number;
    /** Daily probability that the member sticks to the plan */
    adherenceProbability: number;
  };

  careTeam: Record<CareRole, CareTeamMember>;

  travel: {
    locations: string[];
    homeLocation: string;
  };

  llm: {
    enabled: boolean;
    provider: LLMProviderName;
    openRouterApiKey: string | null;
    model: string;
    local: {
      baseUrl: string | null;
      model: string | null;
    };
    timeoutMs: number;
    maxRetries: number;
    appName: string;
  };

  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    /** Directory the config file was read from */
    config: string;
    output: string;
    logs: string;
  };
}

/**
 * The part of the config the engine itself reads.
 */
export type SimulationSettings = Pick<
  MergedConfig,
  'simulation' | 'schedule' | 'member' | 'careTeam' | 'travel'
>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  simulation: {
    horizonDays: 8 * 30,
    startDate: '2025-01-15',
    seed: null,
    onboardingDays: 28,
  },
  schedule: {
    diagnosticIntervalDays: 90,
    exerciseRefreshDays: 14,
    travelHomeDays: 21,
    travelAwayDays: 7,
    wearableRefreshDays: 0.25,
    healthCheckStartDelayDays: 1,
    wellnessCheckDays: 45,
    nutritionReviewDays: 14,
    strategicReviewDays: 90,
  },
  member: {
    profile: {
      name: 'Rohan Patel',
      age: 46,
      goals: [
        'Reduce risk of heart disease by keeping cholesterol and blood pressure in a healthy range',
        'Improve cognitive function and focus for sustained mental performance',
        'Adopt an annual full-body screening routine for early detection',
      ],
      personality:
        'Analytical and driven; values efficiency and evidence-based approaches. Time-constrained and wants clear action plans.',
      healthConditions: ['Borderline high blood pressure (managed)'],
    },
    persona:
      'Role: the client, a regional head of sales at a fintech company. ' +
      'Communication style: direct and concise, asks clarifying questions, ' +
      'occasionally frustrated when things feel inefficient.',
    meanDaysBetweenActions: 7 / 5,
    adherenceProbability: 0.5,
  },
  careTeam: {
    logistics: {
      name: 'Ruby',
      persona:
        'Role: primary point of contact for logistics: scheduling, reminders and follow-ups. ' +
        'Voice: empathetic, organized and proactive; confirms every action.',
    },
    physician: {
      name: 'Dr. Warren',
      persona:
        'Role: team physician and final clinical authority; interprets labs and sets medical direction. ' +
        'Voice: authoritative and precise, explains medical topics plainly.',
    },
    data: {
      name: 'Advik',
      persona:
        'Role: wearable data analyst covering sleep, recovery, HRV and stress trends. ' +
        'Voice: analytical and curious; talks in experiments and hypotheses.',
    },
    nutrition: {
      name: 'Carla',
      persona:
        'Role: owns nutrition plans, food-log and CGM analysis, and supplement advice. ' +
        'Voice: practical and educational, focused on behavior change.',
    },
    movement: {
      name: 'Rachel',
      persona:
        'Role: owns strength, mobility, rehabilitation and exercise programming. ' +
        'Voice: direct and encouraging, focused on form and function.',
    },
    leadership: {
      name: 'Neel',
      persona:
        'Role: senior team lead for strategic reviews and escalations; ties daily work to long-term goals. ' +
        'Voice: strategic and reassuring.',
    },
  },
  travel: {
    locations: ['UK', 'US', 'South Korea', 'Jakarta'],
    homeLocation: 'Singapore',
  },
  llm: {
    enabled: false,
    provider: 'openrouter',
    openRouterApiKey: null,
    model: 'anthropic/claude-3.5-haiku',
    local: {
      baseUrl: null,
      model: null,
    },
    timeoutMs: 60_000,
    maxRetries: 2,
    appName: 'coaching-sim',
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    config: 'data/config',
    output: 'data/output',
    logs: 'data/logs',
  },
};

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;
