/**
 * @module
 * Requirement hashes and skip markers.
 *
 * Installing requirements is slow, so each environment keeps a skip marker: a file holding
 * the hash of everything that determined the last installation. The installation is skipped
 * while the marker is younger than {@link SKIP_MAX_AGE} and the hash is unchanged.
 */
import {
    Progress,
} from './progress';
import crypto = require('crypto');
import fs = require('fs-extra');
import path = require('path');

/** Maximum age of a skip marker, in milliseconds. */
export const SKIP_MAX_AGE = 24 * 3600 * 1000;

/** Name of the skip marker inside the environment directory. */
export const SKIP_FILE = '.skip_install';

/**
 * SHA-256 hex digest of all requirement items and requirement files.
 *
 * Items and file names are sorted first, so the order in which they were collected does not
 * matter. Files that do not exist contribute only their name.
 */
export async function computeReqHash(reqItems: Iterable<string>, reqFiles: Iterable<string>): Promise<string> {
    const hash = crypto.createHash('sha256');
    // Each name ends with a NUL, so ['ab', 'c'] and ['a', 'bc'] differ.
    for (const item of Array.from(reqItems).sort())
        hash.update(`${item}\0`, 'utf-8');
    for (const filename of Array.from(reqFiles).sort()) {
        hash.update(`${filename}\0`, 'utf-8');
        if (await isFile(filename))
            hash.update(await fs.readFile(filename));
    }
    return hash.digest('hex');
}

/**
 * Returns the mtime of `filename` in milliseconds, or -1 when it does not exist.
 */
export async function statMtime(filename: string): Promise<number> {
    let stats;
    try {
        stats = await fs.stat(filename);
    } catch (e) {
        return -1;
    }
    return stats.mtime.getTime();
}

async function isFile(filename: string): Promise<boolean> {
    try {
        return (await fs.stat(filename)).isFile();
    } catch (e) {
        return false;
    }
}

/**
 * Returns true when the requirements must be (re)installed.
 *
 * @param now current time in milliseconds. Default: `Date.now()`.
 */
export async function checkInstallRequirements(fnSkip: string, reqHash: string, progress: Progress,
                                               now: number = Date.now()): Promise<boolean> {
    const mtime = await statMtime(fnSkip);
    if (mtime >= 0 && now - mtime < SKIP_MAX_AGE) {
        const stored = (await fs.readFile(fnSkip, 'utf-8')).trim();
        if (stored === reqHash) {
            progress.info('Skipping install+update of requirements.');
            progress.info(`To force install+update: rm ${fnSkip}`);
            return false;
        }
    }
    progress.info('Starting install+update of requirements.');
    progress.info(`To skip install+update: echo ${reqHash} > ${fnSkip}`);
    return true;
}

/**
 * Stamps the skip marker with `reqHash`.
 */
export async function writeSkipMarker(fnSkip: string, reqHash: string): Promise<void> {
    await fs.mkdirp(path.dirname(fnSkip));
    await fs.writeFile(fnSkip, `${reqHash}\n`);
}
