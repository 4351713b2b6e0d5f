import type { BackendAdapters } from '../backends/types';
import { LibraryCorpus } from './corpus';
import { LibraryDocumentStore } from './documents';
import { LibraryGraph } from './graph';
import { LibraryMetadataSearch } from './metadata';
import { LibraryVectorSearch } from './vector';

export { LibraryCorpus, authorMatches, conceptMatches } from './corpus';
export { LibraryDocumentStore } from './documents';
export { LibraryGraph } from './graph';
export { LibraryMetadataSearch } from './metadata';
export { LibraryVectorSearch } from './vector';
export * from './schema';

/** Every adapter contract, served from one in-process corpus. */
export function libraryAdapters(corpus: LibraryCorpus): Required<BackendAdapters> {
  return {
    vector: new LibraryVectorSearch(corpus),
    graph: new LibraryGraph(corpus),
    metadata: new LibraryMetadataSearch(corpus),
    documents: new LibraryDocumentStore(corpus),
  };
}

export async function openLibrary(file: string): Promise<Required<BackendAdapters>> {
  return libraryAdapters(await LibraryCorpus.load(file));
}
