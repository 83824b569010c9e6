import { ElasticConfig } from "../config";
import { Logger } from "../observability";
import { elasticNodes, ElasticsearchIndexClient } from "./elasticIndex";
import { SearchIndexClient } from "./types";

export function createSearchIndexClients(config: ElasticConfig, logger: Logger): SearchIndexClient[] {
  return elasticNodes(config).map((node) => new ElasticsearchIndexClient(node, config, logger));
}

export * from "./backend";
export * from "./dispatcher";
export * from "./elasticIndex";
export * from "./indexSync";
export * from "./types";
