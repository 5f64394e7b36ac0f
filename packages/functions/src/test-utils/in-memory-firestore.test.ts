import { describe, it, expect } from 'vitest';
import { InMemoryFirestore } from './in-memory-firestore.js';

describe('InMemoryFirestore', () => {
  it('should filter by equality and honour limit', async () => {
    const store = new InMemoryFirestore();
    store.seed('exercises', 'a', { name: 'A', is_template: true });
    store.seed('exercises', 'b', { name: 'B', is_template: false });
    store.seed('exercises', 'c', { name: 'C', is_template: true });

    const snapshot = await store.collection('exercises').where('is_template', '==', true).limit(1).get();

    expect(snapshot.docs.map((doc) => doc.id)).toEqual(['a']);
    expect(store.readCount).toBe(1);
  });

  it('should record writes and merge updates', async () => {
    const store = new InMemoryFirestore();
    const doc = store.collection('exercises').doc('a');

    await doc.set({ name: 'A', video_url: '' });
    await doc.update({ video_url: 'https://vimeo.com/1' });

    expect(store.get('exercises', 'a')).toEqual({ name: 'A', video_url: 'https://vimeo.com/1' });
    expect(store.writes.map((write) => write.op)).toEqual(['set', 'update']);
  });

  it('should reject updates to missing documents and simulated failures', async () => {
    const store = new InMemoryFirestore();

    await expect(store.collection('exercises').doc('missing').update({ name: 'X' })).rejects.toThrow(
      'No document to update: exercises/missing'
    );

    store.failWritesTo('exercises');
    expect(() => store.collection('exercises').doc('a').set({ name: 'A' })).toThrow(
      'Simulated write failure on exercises'
    );
  });
});
