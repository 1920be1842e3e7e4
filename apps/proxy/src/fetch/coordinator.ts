import { RetrievalError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { KeyedGate } from "./gate.js";
import type { MarkerStore } from "./markers.js";
import type { PackageRetriever } from "./retriever.js";
import { stampTree } from "./stampTree.js";
import { locateVcsRoot } from "./vcsRoot.js";

export interface FetchCoordinatorOptions {
  markers: MarkerStore;
  retriever: PackageRetriever;
  logger: Logger;
}

/**
 * Makes sure a package's source tree is on disk and recent enough, running
 * at most one retrieval per package key at a time.
 */
export class FetchCoordinator {
  private readonly gate = new KeyedGate();
  private readonly markers: MarkerStore;
  private readonly retriever: PackageRetriever;
  private readonly logger: Logger;

  constructor(opts: FetchCoordinatorOptions) {
    this.markers = opts.markers;
    this.retriever = opts.retriever;
    this.logger = opts.logger;
  }

  /** Number of `ensure` calls for `packageKey` fetching or queued to fetch. */
  pending(packageKey: string): number {
    return this.gate.load(packageKey);
  }

  /**
   * Resolve `packageKey` to its directory, fetching it first unless a fresh
   * marker covers it.
   *
   * Freshness is not re-checked once the gate is acquired: a request that
   * queued behind an in-flight fetch for the same key fetches again after it.
   */
  async ensure(packageKey: string): Promise<string> {
    const pkgPath = this.markers.packageDirectory(packageKey);
    if (await this.markers.isFresh(pkgPath)) {
      return pkgPath;
    }

    if (this.pending(packageKey) > 0) {
      this.logger.debug({ pkg: packageKey }, "Waiting for in-flight fetch");
    }
    return await this.gate.run(packageKey, () => this.fetch(packageKey, pkgPath));
  }

  private async fetch(packageKey: string, pkgPath: string): Promise<string> {
    this.logger.info({ pkg: packageKey }, "Getting package");
    const result = await this.retriever.retrieve(packageKey);
    if (!result.ok) {
      this.logger.error(
        { pkg: packageKey, reason: result.reason, output: result.output },
        "Get of package failed"
      );
      throw new RetrievalError({ packageKey, reason: result.reason, output: result.output });
    }
    this.logger.info({ pkg: packageKey }, "Fetched package");

    const root = await locateVcsRoot(pkgPath);
    this.logger.info({ pkg: packageKey, root }, "Located checkout root");
    const stamped = await stampTree(root, this.markers, this.logger);
    this.logger.debug({ pkg: packageKey, root, stamped }, "Stamped freshness markers");

    return pkgPath;
  }
}
