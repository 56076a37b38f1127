import { z } from "zod";
import { CalendarDate, compareDates, parseIsoDate, todayLocal } from "../calendarDate.js";
import { InvalidBirthDetailsError } from "../../insight/errors.js";

export const MISSING_FIELDS_MESSAGE = "Missing required fields: name, birth_date";
export const INVALID_BIRTH_DATE_MESSAGE = "Invalid birth_date format. Use YYYY-MM-DD";
export const EMPTY_NAME_MESSAGE = "Name cannot be empty";
export const FUTURE_DATE_MESSAGE = "Birth date cannot be in the future";

/**
 * Raw request shape. Presence is checked here; format and meaning are
 * checked by createBirthDetails so each failure keeps its own message.
 */
export const BirthDetailsInputSchema = z.object({
  name: z.string({ invalid_type_error: MISSING_FIELDS_MESSAGE }).optional(),
  birth_date: z.string({ invalid_type_error: MISSING_FIELDS_MESSAGE }).optional(),
  // Informational only: any value is accepted and never rejected.
  birth_time: z.unknown().optional(),
  birth_place: z.unknown().optional(),
  language: z.string({ invalid_type_error: "Invalid language. Use en or hi" }).nullish(),
});

export type BirthDetailsInput = z.infer<typeof BirthDetailsInputSchema>;

export type BirthDetails = {
  name: string;
  birth_date: CalendarDate;
  // Kept as given; no computation reads either.
  birth_time: string | null;
  birth_place: string | null;
};

/**
 * Validate raw fields into BirthDetails. Throws InvalidBirthDetailsError.
 */
export function createBirthDetails(
  input: BirthDetailsInput,
  today: CalendarDate = todayLocal()
): BirthDetails {
  const { name, birth_date } = input;
  if (!name || !birth_date) {
    throw new InvalidBirthDetailsError(MISSING_FIELDS_MESSAGE);
  }

  const birthDate = parseIsoDate(birth_date);
  if (!birthDate) {
    throw new InvalidBirthDetailsError(INVALID_BIRTH_DATE_MESSAGE, "birth_date");
  }

  const trimmedName = name.trim();
  if (trimmedName === "") {
    throw new InvalidBirthDetailsError(EMPTY_NAME_MESSAGE, "name");
  }

  if (compareDates(birthDate, today) > 0) {
    throw new InvalidBirthDetailsError(FUTURE_DATE_MESSAGE, "birth_date");
  }

  return {
    name: trimmedName,
    birth_date: birthDate,
    birth_time: optionalText(input.birth_time),
    birth_place: optionalText(input.birth_place),
  };
}

function optionalText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}
