import OpenAI from "openai";
import type { RemoteModel } from "../Interfaces";
import { DEFAULT_BASE_URL } from "../ModelDefaults";

export interface RemoteClientOptions {
  baseURL?: string;
  apiKey: string;
}

// The part of the OpenAI client the model listing needs.
export interface ModelLister {
  models: {
    list(): Promise<{ data: Array<{ id: string; owned_by?: string; created?: number }> }>;
  };
}

export function getClient({ baseURL, apiKey }: RemoteClientOptions): OpenAI {
  if (!apiKey) throw new Error("Missing access token");
  return new OpenAI({ apiKey, baseURL: baseURL || DEFAULT_BASE_URL, maxRetries: 0 });
}

/** Models the endpoint reports through `GET /models`, sorted by id. */
export async function fetchModels(opts: RemoteClientOptions, client: ModelLister = getClient(opts)): Promise<RemoteModel[]> {
  const response = await client.models.list();
  return response.data
    .map((model): RemoteModel => ({
      id: model.id,
      owned_by: model.owned_by,
      created: model.created,
    }))
    .sort((a, b) => a.id.localeCompare(b.id));
}
