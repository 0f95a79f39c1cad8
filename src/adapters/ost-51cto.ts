import { SourceProfile } from '../types/source';

const OST_BASE_URL = 'https://ost.51cto.com';

/**
 * 51CTO open-source community post list.
 * Listing ids grow over time, so a floor id separates history from new posts.
 */
export const OST_51CTO_SOURCE: SourceProfile = {
  name: '51CTO',
  category: '技术文章',
  listUrl: `${OST_BASE_URL}/postlist`,
  selectors: {
    list: 'ul.infinite-list',
    listItem: 'ul.infinite-list > li',
    itemLink: "a[href*='posts']",
    itemTitle: 'h3.title-h3',
    content: '.posts-content',
    author: ['.name', '.author', '.post-author'],
    publishTime: ['time', '.publish-time', '.post-time'],
    nextPage: 'a, button',
  },
  nextPageLabel: '下一页',
  articleIdPattern: /\/posts\/(\d+)\/?$/,
};
