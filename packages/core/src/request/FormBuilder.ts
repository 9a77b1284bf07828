export type FormValue = string | number | boolean;

/**
 * Builds a multipart form body. File parts carry a filename so servers treat
 * them as uploads.
 */
export class FormBuilder {
  private readonly data = new FormData();

  append(key: string, value: FormValue): this {
    this.data.append(key, String(value));
    return this;
  }

  appendFile(
    key: string,
    bytes: Uint8Array,
    fileName: string = key,
    contentType?: string,
  ): this {
    const blob = new Blob([bytes], contentType ? { type: contentType } : {});
    this.data.append(key, blob, fileName);
    return this;
  }

  toFormData(): FormData {
    return this.data;
  }
}
