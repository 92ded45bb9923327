import type { SupabaseClient } from "@supabase/supabase-js";

export const BLOB_URI_SCHEME = "supabase://";

export type BlobLocation = {
  bucket: string;
  path: string;
};

export interface BlobStore {
  /** Writes (or overwrites) the named blob and returns its store URI. */
  put(name: string, payload: string, contentType: string): Promise<string>;
  get(uri: string): Promise<string>;
}

export function formatBlobUri(location: BlobLocation): string {
  return `${BLOB_URI_SCHEME}${location.bucket}/${location.path}`;
}

export function parseBlobUri(uri: string): BlobLocation {
  if (!uri.startsWith(BLOB_URI_SCHEME)) {
    throw new Error(`Unsupported blob URI: ${uri}`);
  }
  const rest = uri.slice(BLOB_URI_SCHEME.length);
  const slash = rest.indexOf("/");
  if (slash <= 0 || slash === rest.length - 1) {
    throw new Error(`Blob URI must name a bucket and a path: ${uri}`);
  }
  return { bucket: rest.slice(0, slash), path: rest.slice(slash + 1) };
}

export class SupabaseBlobStore implements BlobStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string
  ) {}

  async put(name: string, payload: string, contentType: string): Promise<string> {
    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(name, payload, { contentType, upsert: true });
    if (error) {
      throw new Error(`Failed uploading ${name} to bucket ${this.bucket}: ${error.message}`);
    }
    const uri = formatBlobUri({ bucket: this.bucket, path: name });
    console.log(`Uploaded ${name} -> ${uri}`);
    return uri;
  }

  async get(uri: string): Promise<string> {
    const { bucket, path } = parseBlobUri(uri);
    const { data, error } = await this.client.storage.from(bucket).download(path);
    if (error) {
      throw new Error(`Failed downloading ${uri}: ${error.message}`);
    }
    return data.text();
  }
}
