import {
  childElements,
  isElement,
  rootElement,
  rootIndex,
  type GnuTunesDb,
  type XmlElement,
  type XmlNode,
} from './tunes-db.js';

export function buildPlaylist(name: string, trackIds: readonly number[], plid?: string): XmlElement {
  return {
    tag: 'playlist',
    attributes: plid === undefined ? { name } : { name, plid },
    children: trackIds.map((id) => ({ tag: 'add', attributes: { id: String(id) }, children: [] })),
  };
}

export function findPlaylist(db: GnuTunesDb, name: string): XmlElement | undefined {
  return childElements(rootElement(db), 'playlist').find((playlist) => playlist.attributes.name === name);
}

/**
 * Puts a playlist called `name` with `trackIds` into the database. An existing
 * playlist of that name is replaced where it stands and keeps its `plid`;
 * otherwise the playlist goes last under the root. Returns a new document.
 */
export function upsertPlaylist(db: GnuTunesDb, name: string, trackIds: readonly number[]): GnuTunesDb {
  const root = rootElement(db);
  const existingIndex = root.children.findIndex(
    (child) => isElement(child) && child.tag === 'playlist' && child.attributes.name === name,
  );

  let children: XmlNode[];
  if (existingIndex === -1) {
    children = [...root.children, buildPlaylist(name, trackIds)];
  } else {
    const existing = root.children[existingIndex];
    const plid = isElement(existing) && 'plid' in existing.attributes ? existing.attributes.plid : undefined;
    children = root.children.map((child, index) =>
      index === existingIndex ? buildPlaylist(name, trackIds, plid) : child,
    );
  }

  const at = rootIndex(db);
  return {
    nodes: db.nodes.map((node, index) => (index === at ? { ...root, children } : node)),
  };
}

/** Track ids of a playlist, in order. */
export function playlistTrackIds(playlist: XmlElement): number[] {
  return childElements(playlist, 'add').map((add) => Number(add.attributes.id));
}
