import type { FormBuilder } from "@fedikit/core";

/**
 * Appends profile fields as `prefix[i][name]` / `prefix[i][value]` pairs.
 *
 * An empty record sends a single blank pair, which tells the server to clear
 * every field.
 */
export function appendFieldsHash(
  form: FormBuilder,
  fields: Readonly<Record<string, string>>,
  prefix = "fields_attributes",
): FormBuilder {
  const entries = Object.entries(fields);
  if (entries.length === 0) {
    return form.append(`${prefix}[0][name]`, "").append(`${prefix}[0][value]`, "");
  }
  entries.forEach(([name, value], i) => {
    form.append(`${prefix}[${i}][name]`, name).append(`${prefix}[${i}][value]`, value);
  });
  return form;
}
