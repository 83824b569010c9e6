import crypto from "node:crypto";
import { Client, ClientOptions, estypes } from "@elastic/elasticsearch";
import { ElasticConfig } from "../config";
import { describeError, Logger } from "../observability";
import { PageIndexDocument, StoredPage } from "../types";
import { SearchIndexClient } from "./types";

export const PAGE_INDEX_MAPPINGS: estypes.MappingTypeMapping = {
  properties: {
    title: { type: "text" },
    url: { type: "keyword" },
    content: { type: "text" },
    language: { type: "keyword" },
    lastUpdated: { type: "date" },
  },
};

export const PAGE_SEARCH_FIELDS = ["title^3", "url^2", "content"];

export function createDocumentId(url: string): string {
  return crypto.createHash("sha256").update(url).digest("hex").slice(0, 24);
}

export function toIndexDocument(page: StoredPage): PageIndexDocument {
  return {
    title: page.title,
    url: page.url,
    content: page.content,
    language: page.language,
    lastUpdated: page.lastUpdated,
  };
}

export function buildSearchRequest(index: string, query: string, size: number): estypes.SearchRequest {
  return {
    index,
    size,
    query: {
      multi_match: {
        query,
        fields: PAGE_SEARCH_FIELDS,
      },
    },
  };
}

export function elasticNodes(config: ElasticConfig): string[] {
  return [`http://${config.host}:${config.port}`, `https://${config.host}:${config.port}`];
}

export function buildClientOptions(node: string, config: ElasticConfig): ClientOptions {
  const options: ClientOptions = {
    node,
    requestTimeout: config.requestTimeoutMs,
  };
  if (config.username && config.password) {
    options.auth = { username: config.username, password: config.password };
  }
  if (node.startsWith("https://")) {
    options.tls = { rejectUnauthorized: false };
  }
  return options;
}

export class ElasticsearchIndexClient implements SearchIndexClient {
  readonly endpoint: string;
  readonly indexName: string;
  private readonly client: Client;
  private readonly logger: Logger;

  constructor(node: string, config: ElasticConfig, logger: Logger) {
    this.endpoint = node;
    this.indexName = config.index;
    this.client = new Client(buildClientOptions(node, config));
    this.logger = logger;
  }

  async ping(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      this.logger.debug("search_engine_ping_failed", { endpoint: this.endpoint, error: describeError(error) });
      return false;
    }
  }

  async indexExists(): Promise<boolean> {
    return this.client.indices.exists({ index: this.indexName });
  }

  async deleteIndex(): Promise<void> {
    await this.client.indices.delete({ index: this.indexName });
  }

  async createIndex(): Promise<void> {
    await this.client.indices.create({ index: this.indexName, mappings: PAGE_INDEX_MAPPINGS });
  }

  async indexDocument(document: PageIndexDocument): Promise<void> {
    await this.client.index({
      index: this.indexName,
      id: createDocumentId(document.url),
      document,
      refresh: true,
    });
  }

  async search(query: string, size: number): Promise<PageIndexDocument[]> {
    const response = await this.client.search<PageIndexDocument>(buildSearchRequest(this.indexName, query, size));
    return response.hits.hits.flatMap((hit) => (hit._source ? [hit._source] : []));
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
