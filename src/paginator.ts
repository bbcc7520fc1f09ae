import type { GraphQLExecutor } from "./types.js";

export interface PageInfo {
	hasNextPage: boolean;
	endCursor: string | null;
}

export interface Connection<TNode> {
	nodes: readonly TNode[];
	pageInfo: PageInfo;
}

/** Selects the paginated connection from a response. */
export type CursorPath<TData, TNode> = (
	data: TData
) => Connection<TNode> | null | undefined;

export interface Page<TData, TNode> {
	/** Zero-based page number */
	index: number;
	nodes: readonly TNode[];
	pageInfo: PageInfo;
	data: TData;
	/** Set on the last page when `maxPages` stopped iteration early. */
	truncated: boolean;
}

export interface PageOptions {
	/** Page-count ceiling. Defaults to 100. */
	maxPages?: number;
	signal?: AbortSignal;
}

export const DEFAULT_MAX_PAGES = 100;

/**
 * Runs a cursor-paginated query. The query must declare `$cursor: String`
 * and pass it as `after:` to the connection selected by `cursorPath`.
 */
export class PaginatingQueryRunner {
	private client: GraphQLExecutor;

	constructor(client: GraphQLExecutor) {
		this.client = client;
	}

	/**
	 * Lazy, forward-only sequence of pages. A page is requested only when the
	 * consumer asks for it; breaking out of the loop stops all further requests.
	 */
	async *pages<TData, TNode>(
		query: string,
		variables: Record<string, unknown>,
		cursorPath: CursorPath<TData, TNode>,
		options: PageOptions = {}
	): AsyncGenerator<Page<TData, TNode>, void, undefined> {
		const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
		let cursor: string | null =
			typeof variables.cursor === "string" ? variables.cursor : null;

		for (let index = 0; index < maxPages; index++) {
			const data = await this.client.execute<TData>(
				query,
				{ ...variables, cursor },
				{ signal: options.signal }
			);
			const connection = cursorPath(data);
			if (!connection) return;

			const { pageInfo } = connection;
			const more = pageInfo.hasNextPage && pageInfo.endCursor !== null;
			yield {
				index,
				nodes: connection.nodes,
				pageInfo,
				data,
				truncated: more && index + 1 >= maxPages
			};
			if (!more) return;
			cursor = pageInfo.endCursor;
		}
	}

	/** Every node across all pages, in page order. */
	async collect<TData, TNode>(
		query: string,
		variables: Record<string, unknown>,
		cursorPath: CursorPath<TData, TNode>,
		options: PageOptions = {}
	): Promise<TNode[]> {
		const all: TNode[] = [];
		for await (const page of this.pages(query, variables, cursorPath, options)) {
			all.push(...page.nodes);
		}
		return all;
	}
}
