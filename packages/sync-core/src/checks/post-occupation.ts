import type { Check } from './context.js';

/** Check #4: report posts nobody holds */
export const postOccupationCheck: Check = {
  id: 'post-occupation',
  title: 'Post occupation',

  async run(context, ledger) {
    const posts = await context.state.listUnoccupiedPosts();
    for (const post of posts) {
      ledger.open({
        type: 'unoccupied_post',
        postId: post.postId,
        postLabel: post.postLabel,
        message: `Post ${post.postLabel} has no holder`,
      });
    }
  },
};
