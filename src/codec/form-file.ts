/**
 * A raw byte field sent as a file part of a multipart body.
 *
 * JSON and XML encoders send the content base64-encoded instead.
 */
export class FormFile {
  readonly content: Uint8Array;
  readonly filename: string;
  readonly contentType: string;

  constructor(content: Uint8Array, filename: string, contentType = 'application/octet-stream') {
    this.content = content;
    this.filename = filename;
    this.contentType = contentType;
  }
}
