/**
 * Ajv validation instance with schema validators
 */

import Ajv2020, { type ValidateFunction, type ErrorObject } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawSettings } from '@/core/config';
import type { DraftOrderTicket } from '@/types/orders';
import type { PositionInput } from '@/types/portfolio';

// Draft 2020-12, same strictness as the stored schemas expect
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let settingsValidator: ValidateFunction<RawSettings> | null = null;
let positionValidator: ValidateFunction<PositionInput> | null = null;
let ticketValidator: ValidateFunction<DraftOrderTicket> | null = null;

export function getSettingsValidator(): ValidateFunction<RawSettings> {
  if (!settingsValidator) {
    settingsValidator = ajv.compile<RawSettings>(loadSchema('settings.v1'));
  }
  return settingsValidator;
}

export function getPositionValidator(): ValidateFunction<PositionInput> {
  if (!positionValidator) {
    positionValidator = ajv.compile<PositionInput>(loadSchema('positions.v1'));
  }
  return positionValidator;
}

export function getTicketValidator(): ValidateFunction<DraftOrderTicket> {
  if (!ticketValidator) {
    ticketValidator = ajv.compile<DraftOrderTicket>(loadSchema('draft_ticket.v1'));
  }
  return ticketValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
    'Unknown validation error',
  ];
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}

export function validateSettings(data: unknown): ValidationResult<RawSettings> {
  return runValidator(getSettingsValidator(), data);
}

export function validatePositionInput(data: unknown): ValidationResult<PositionInput> {
  return runValidator(getPositionValidator(), data);
}

export function validateDraftTicket(data: unknown): ValidationResult<DraftOrderTicket> {
  return runValidator(getTicketValidator(), data);
}
