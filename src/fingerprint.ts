/**
 * @module
 * Computes target fingerprints.
 *
 * A fingerprint binds the target's own path state (non-phony targets only) and the persisted
 * fingerprints of its prerequisites, so a change anywhere below a target changes its fingerprint.
 */
import {
    Fingerprint,
    FingerprintStore,
    statPath,
} from './store';
import crypto = require('crypto');
import fs = require('fs-extra');

/**
 * Computes the current fingerprint of a target.
 *
 * @param filename absolute path of the target, ignored when `isPhony`.
 */
export async function computeFingerprint(store: FingerprintStore, filename: string, prerequisites: readonly string[],
                                         isPhony: boolean): Promise<Fingerprint> {
    let hash: crypto.Hash;
    if (!isPhony) {
        hash = crypto.createHash('md5').update('p');
        const kind = await statPath(filename);
        if (kind !== 'missing') {
            hash.update('@17@');
            if (kind === 'file')
                hash.update(await fs.readFile(filename));
        } else {
            hash.update('@0');
        }
    } else {
        hash = crypto.createHash('md5').update('f');
    }

    for (const name of [...prerequisites].sort())
        hash.update(await store.load(name));

    return hash.digest();
}
