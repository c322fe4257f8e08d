import { z } from "zod";

export const CampaignTypeSchema = z.enum(["outbound", "reply_followup"]);
export type CampaignType = z.infer<typeof CampaignTypeSchema>;

/** PATCH /api/campaigns/{id}/update */
export const CampaignSettingsSchema = z.object({
  name: z.string().optional(),
  max_emails_per_day: z.number().int().optional(),
  max_new_leads_per_day: z.number().int().optional(),
  plain_text: z.boolean().optional(),
  open_tracking: z.boolean().optional(),
  reputation_building: z.boolean().optional(),
  can_unsubscribe: z.boolean().optional(),
  unsubscribe_text: z.string().optional(),
  include_auto_replies_in_stats: z.boolean().optional()
});
export type CampaignSettings = z.infer<typeof CampaignSettingsSchema>;

const HHMM = /^\d{2}:\d{2}$/;

/** POST /api/campaigns/{id}/schedule */
export const CampaignScheduleSchema = z.object({
  monday: z.boolean().default(true),
  tuesday: z.boolean().default(true),
  wednesday: z.boolean().default(true),
  thursday: z.boolean().default(true),
  friday: z.boolean().default(true),
  saturday: z.boolean().default(false),
  sunday: z.boolean().default(false),
  start_time: z.string().regex(HHMM, "expected HH:MM"),
  end_time: z.string().regex(HHMM, "expected HH:MM"),
  timezone: z.string().min(1),
  save_as_template: z.boolean().default(false)
});
export type CampaignSchedule = z.infer<typeof CampaignScheduleSchema>;

const SequenceStepFields = {
  email_subject: z.string().min(1),
  email_subject_variables: z.array(z.string()).optional(),
  order: z.number().int().optional(),
  email_body: z.string().min(1),
  wait_in_days: z.number().int().min(0),
  variant: z.boolean().optional(),
  variant_from_step: z.number().int().optional(),
  variant_from_step_id: z.number().int().optional(),
  thread_reply: z.boolean().optional()
};

function oneVariantSource(step: { variant_from_step?: number; variant_from_step_id?: number }) {
  return step.variant_from_step === undefined || step.variant_from_step_id === undefined;
}

const variantMessage = { message: "Use only one of variant_from_step or variant_from_step_id" };

export const SequenceStepSchema = z.object(SequenceStepFields).refine(oneVariantSource, variantMessage);
export type SequenceStep = z.infer<typeof SequenceStepSchema>;

export const SequenceSpecSchema = z.object({
  title: z.string().min(1),
  sequence_steps: z.array(SequenceStepSchema).min(1)
});
export type SequenceSpec = z.infer<typeof SequenceSpecSchema>;

// Updates address existing steps by id.
export const SequenceUpdateStepSchema = z
  .object({ id: z.number().int(), ...SequenceStepFields })
  .refine(oneVariantSource, variantMessage);
export type SequenceUpdateStep = z.infer<typeof SequenceUpdateStepSchema>;

export const SequenceUpdateSpecSchema = z.object({
  title: z.string().min(1),
  sequence_steps: z.array(SequenceUpdateStepSchema).min(1)
});
export type SequenceUpdateSpec = z.infer<typeof SequenceUpdateSpecSchema>;

export const LeadsSpecSchema = z
  .object({
    lead_list_id: z.number().int().optional(),
    lead_ids: z.array(z.number().int()).optional(),
    allow_parallel_sending: z.boolean().default(false)
  })
  .refine((l) => l.lead_list_id === undefined || l.lead_ids === undefined, {
    message: "Use only one of lead_list_id or lead_ids"
  });
export type LeadsSpec = z.infer<typeof LeadsSpecSchema>;

/**
 * Resolves sender email accounts at workflow time. search/tag filters go to
 * the server; status is matched client-side; the result is the `limit`
 * lowest ids.
 */
export const SenderEmailSelectorSchema = z.object({
  search: z.string().optional(),
  tag_ids: z.array(z.number().int()).optional(),
  excluded_tag_ids: z.array(z.number().int()).optional(),
  without_tags: z.boolean().optional(),
  status: z.string().optional(),
  limit: z.number().int().positive().default(1)
});
export type SenderEmailSelector = z.infer<typeof SenderEmailSelectorSchema>;

export const CampaignCreateSpecSchema = z
  .object({
    name: z.string().min(1),
    type: CampaignTypeSchema.default("outbound"),
    settings: CampaignSettingsSchema.optional(),
    schedule: CampaignScheduleSchema.optional(),
    sequence: SequenceSpecSchema.optional(),
    sender_email_ids: z.array(z.number().int()).min(1).optional(),
    sender_emails: SenderEmailSelectorSchema.optional(),
    leads: LeadsSpecSchema.optional(),
    start: z.boolean().default(false),
    force_start: z.boolean().default(false)
  })
  .strict()
  .refine((s) => s.sender_email_ids === undefined || s.sender_emails === undefined, {
    message: "Use only one of sender_email_ids or sender_emails"
  });
export type CampaignCreateSpec = z.infer<typeof CampaignCreateSpecSchema>;
export type CampaignCreateSpecInput = z.input<typeof CampaignCreateSpecSchema>;

export type WorkflowStepResult = {
  name: string;
  method: string;
  url: string;
  status_code: number | null;
  request_id: string | null;
  error: string | null;
};

export type CreateCampaignResult = {
  run_id: string;
  id: number;
  name: string;
  status: string | null;
  sender_email_ids: number[] | null;
  sequence_id: number | null;
  sequence_step_ids: number[] | null;
  started: boolean;
  start_status: string | null;
  steps: WorkflowStepResult[];
  raw: Record<string, unknown>;
};

export type ColumnsToMap = {
  first_name: string;
  last_name: string;
  email: string;
};

export type BatchFilePlan = {
  path: string;
  campaign_name: string;
  lead_count: number;
  columns_to_map: ColumnsToMap;
};

export type BatchFileResult =
  | {
      ok: true;
      csv: string;
      campaign_name: string;
      campaign_id: number;
      lead_list_id: number;
      lead_list_status: string;
      lead_count: number;
    }
  | {
      ok: false;
      csv: string;
      campaign_name: string;
      lead_count: number;
      error_type: string;
      error: string;
    };

export type BatchSummary = {
  total_processed: number;
  succeeded: number;
  failed: number;
  leads_loaded: number;
};

export type BatchResult = {
  dry_run: false;
  summary: BatchSummary;
  files: BatchFileResult[];
};

export type BatchDryRunResult = {
  dry_run: true;
  summary: BatchSummary;
  files: Array<{ csv: string; campaign_name: string; lead_count: number }>;
};
