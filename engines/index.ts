export { ElasticsearchAdapter, type ElasticsearchAdapterOptions } from './adapters/elasticsearch-adapter';
export { OpenSearchAdapter, type OpenSearchAdapterOptions } from './adapters/opensearch-adapter';
export { SolrAdapter, type SolrAdapterOptions } from './adapters/solr-adapter';
export { VespaAdapter, type VespaAdapterOptions } from './adapters/vespa-adapter';
export { MemorySearchAdapter, type MemoryAdapterOptions } from './adapters/memory-adapter';
export { DEFAULT_TIMEOUTS, HttpStatusError, type HttpTimeouts } from './http';
