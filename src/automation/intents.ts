export type IntentName =
  | "apply-button"
  | "application-form"
  | "name-field"
  | "first-name-field"
  | "last-name-field"
  | "email-field"
  | "phone-field"
  | "location-field"
  | "resume-upload"
  | "submit-button"
  | "confirmation"
  | "validation-error";

export interface IntentDescriptor {
  name: IntentName;
  selectors: readonly string[];
  // "unique" needs exactly one structural match; "first" only needs presence.
  match: "unique" | "first";
}

export type IntentCatalog = Readonly<Record<IntentName, IntentDescriptor>>;

const VISIBLE = " >> visible=true";

export const DEFAULT_INTENTS: IntentCatalog = Object.freeze({
  "apply-button": {
    name: "apply-button",
    selectors: [
      `role=button[name=/^\\s*apply( now| for this job)?\\s*$/i]${VISIBLE}`,
      `role=link[name=/^\\s*apply( now| for this job)?\\s*$/i]${VISIBLE}`,
      `text=/quick apply|easy apply/i${VISIBLE}`,
    ],
    match: "unique",
  },
  "application-form": {
    name: "application-form",
    selectors: ["form:has(input[type=file])", "form:has(input[type=email])", "#application-form, #application_form"],
    match: "first",
  },
  "name-field": {
    name: "name-field",
    selectors: [
      `input[autocomplete=name]${VISIBLE}`,
      `input[name*=full_name i], input[name*=fullname i], input[id*=full_name i]${VISIBLE}`,
      `input[aria-label*="full name" i], input[placeholder*="full name" i]${VISIBLE}`,
    ],
    match: "unique",
  },
  "first-name-field": {
    name: "first-name-field",
    selectors: [
      `input[autocomplete=given-name]${VISIBLE}`,
      `input[name*=first_name i], input[name*=firstname i], input[id*=first_name i]${VISIBLE}`,
    ],
    match: "unique",
  },
  "last-name-field": {
    name: "last-name-field",
    selectors: [
      `input[autocomplete=family-name]${VISIBLE}`,
      `input[name*=last_name i], input[name*=lastname i], input[id*=last_name i]${VISIBLE}`,
    ],
    match: "unique",
  },
  "email-field": {
    name: "email-field",
    selectors: [`input[type=email]${VISIBLE}`, `input[name*=email i], input[placeholder*=email i]${VISIBLE}`],
    match: "unique",
  },
  "phone-field": {
    name: "phone-field",
    selectors: [`input[type=tel]${VISIBLE}`, `input[name*=phone i], input[placeholder*=phone i]${VISIBLE}`],
    match: "unique",
  },
  "location-field": {
    name: "location-field",
    selectors: [`input[name*=location i], input[id*=location i]${VISIBLE}`, `input[name*=city i]${VISIBLE}`],
    match: "unique",
  },
  "resume-upload": {
    name: "resume-upload",
    selectors: [
      "input[type=file][name*=resume i], input[type=file][id*=resume i]",
      "input[type=file][name*=cv i], input[type=file][id*=cv i]",
      "input[type=file]",
    ],
    match: "unique",
  },
  "submit-button": {
    name: "submit-button",
    selectors: [
      `button[type=submit]${VISIBLE}`,
      `input[type=submit]${VISIBLE}`,
      `role=button[name=/submit( application)?/i]${VISIBLE}`,
    ],
    match: "unique",
  },
  confirmation: {
    name: "confirmation",
    selectors: [
      "text=/thank(s| you) for (applying|your application|your interest)/i",
      "text=/application (has been )?(received|submitted)/i",
      "text=/we('|’)ve received your application/i",
    ],
    match: "first",
  },
  "validation-error": {
    name: "validation-error",
    selectors: [`[aria-invalid=true]${VISIBLE}`, `.field-error, .error-message, .invalid-feedback${VISIBLE}`],
    match: "first",
  },
});
