import type { Octokit } from "octokit";
import type { RepoInfo } from "./github.mts";
import { describeError, type DeployLog } from "./log.mts";

export const RETAINED_ASSETS = 5;

export type ReleaseAsset = {
  id: number;
  name: string;
  updated_at: string;
};

/**
 * Picks the release assets to delete: everything but the `retain` most
 * recently updated ones. The asset published by the current run is never
 * selected, even when it is among the oldest.
 * @param assets All assets of the release.
 * @param keepAssetId The id of the asset the current deployment published.
 * @param log Receives a warning when the current asset had to be spared.
 * @param retain How many assets to keep.
 */
export function selectOutdatedAssets<T extends ReleaseAsset>(
  assets: readonly T[],
  keepAssetId: number | null,
  log?: DeployLog,
  retain: number = RETAINED_ASSETS
): T[] {
  if (assets.length <= retain) {
    return [];
  }

  const sorted = [...assets].sort(
    (a, b) => Date.parse(a.updated_at) - Date.parse(b.updated_at)
  );
  return sorted.slice(0, sorted.length - retain).filter((asset) => {
    if (asset.id === keepAssetId) {
      log?.warn(`Refusing to delete newly published asset ${asset.id}`);
      return false;
    }
    return true;
  });
}

/**
 * Extracts the asset id from a release asset API URL.
 * @param url e.g. `https://api.github.com/repos/o/r/releases/assets/42`
 */
export function parseAssetId(url: string): number | null {
  const match = /\/releases\/assets\/(\d+)$/.exec(url);
  return match != null ? Number(match[1]) : null;
}

/**
 * Deletes outdated assets from the release tagged `tag`. Each deletion is
 * independent: a failure is logged and the remaining assets are still tried.
 * @param octokit A client authenticated for the repository.
 * @param repoInfo The repository owning the release.
 * @param tag The release tag (the environment name).
 * @param keepAssetId The asset published by the current deployment.
 * @param log The invocation's log collector.
 * @returns The ids of the assets that were deleted.
 */
export async function pruneReleaseAssets(
  octokit: Octokit,
  repoInfo: RepoInfo,
  tag: string,
  keepAssetId: number | null,
  log: DeployLog
): Promise<number[]> {
  const { data: release } = await octokit.rest.repos.getReleaseByTag({
    owner: repoInfo.owner,
    repo: repoInfo.repo,
    tag,
  });

  const assets = await octokit.paginate(octokit.rest.repos.listReleaseAssets, {
    owner: repoInfo.owner,
    repo: repoInfo.repo,
    release_id: release.id,
    per_page: 100,
  });

  const outdated = selectOutdatedAssets(assets, keepAssetId, log);
  if (outdated.length === 0) {
    log.debug(`Release ${tag} has ${assets.length} assets, nothing to prune`);
    return [];
  }

  const deleted: number[] = [];
  for (const asset of outdated) {
    log.info(
      `Delete outdated asset ${asset.id} (${asset.name}, last updated ${asset.updated_at})`
    );
    try {
      await octokit.rest.repos.deleteReleaseAsset({
        owner: repoInfo.owner,
        repo: repoInfo.repo,
        asset_id: asset.id,
      });
      deleted.push(asset.id);
    } catch (err) {
      log.error(`Deleting asset ${asset.id} failed: ${describeError(err)}`);
    }
  }
  return deleted;
}
