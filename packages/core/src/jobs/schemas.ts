// packages/core/src/jobs/schemas.ts — zod schemas for z/OSMF jobs JSON documents

import { z } from 'zod';
import type { Job, JobFile, JobStep } from '../types/jobs.js';

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? undefined);

export const jobStepSchema = z
  .object({
    'step-number': z.number().int(),
    'step-name': z.string(),
    'proc-step-name': optionalString,
    'program-name': optionalString,
    active: z.boolean().default(false),
    completion: optionalString,
    smfid: optionalString,
  })
  .transform(
    (s): JobStep => ({
      stepNumber: s['step-number'],
      stepName: s['step-name'],
      procStepName: s['proc-step-name'],
      programName: s['program-name'],
      active: s.active,
      completion: s.completion,
      smfid: s.smfid,
    }),
  );

export const jobSchema = z
  .object({
    jobname: z.string().min(1),
    jobid: z.string().min(1),
    status: optionalString,
    owner: optionalString,
    type: optionalString,
    class: optionalString,
    retcode: z.string().nullish(),
    subsystem: optionalString,
    phase: optionalNumber,
    'phase-name': optionalString,
    url: optionalString,
    'files-url': optionalString,
    'job-correlator': optionalString,
    'step-data': z.array(jobStepSchema).optional(),
  })
  .transform(
    (j): Job => ({
      jobName: j.jobname,
      jobId: j.jobid,
      status: j.status,
      owner: j.owner,
      type: j.type,
      jobClass: j.class,
      retCode: j.retcode,
      subsystem: j.subsystem,
      phase: j.phase,
      phaseName: j['phase-name'],
      url: j.url,
      filesUrl: j['files-url'],
      jobCorrelator: j['job-correlator'],
      stepData: j['step-data'],
    }),
  );

export const jobListSchema = z.array(jobSchema);

export const jobFileSchema = z
  .object({
    jobname: z.string().min(1),
    jobid: z.string().min(1),
    id: z.number().int(),
    ddname: z.string(),
    stepname: optionalString,
    procstep: optionalString,
    class: optionalString,
    'byte-count': optionalNumber,
    'record-count': optionalNumber,
    recfm: optionalString,
    lrecl: optionalNumber,
    'records-url': optionalString,
  })
  .transform(
    (f): JobFile => ({
      jobName: f.jobname,
      jobId: f.jobid,
      id: f.id,
      ddName: f.ddname,
      stepName: f.stepname,
      procStep: f.procstep,
      fileClass: f.class,
      byteCount: f['byte-count'],
      recordCount: f['record-count'],
      recfm: f.recfm,
      lrecl: f.lrecl,
      recordsUrl: f['records-url'],
    }),
  );

export const jobFileListSchema = z.array(jobFileSchema);

/** Body of a synchronous (version 2.0) modify or delete response. */
export const modifyResponseSchema = z.object({
  jobid: z.string(),
  jobname: z.string(),
  'original-jobid': z.string().optional(),
  owner: z.string().optional(),
  member: z.string().optional(),
  sysname: z.string().optional(),
  'job-correlator': z.string().optional(),
  status: z.union([z.number(), z.string()]).optional(),
  'internal-code': z.string().optional(),
  message: z.string().optional(),
});

export type ModifyResponse = z.output<typeof modifyResponseSchema>;
