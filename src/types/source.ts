// Static description of the listing source the crawler walks
export interface SourceProfile {
  name: string;              // Stored as Article.source
  category: string;          // Stored as Article.category
  listUrl: string;           // Page 1 of the listing
  selectors: {
    list: string;            // Container that must appear before items are read
    listItem: string;
    itemLink: string;
    itemTitle: string;
    content: string;         // Article body container
    author: string[];        // Tried in order, first non-empty wins
    publishTime: string[];
    nextPage: string;        // Candidate controls for the next-page button
  };
  nextPageLabel: string;     // Visible text of the next-page control
  articleIdPattern: RegExp;  // Captures the numeric id from an article URL
}
