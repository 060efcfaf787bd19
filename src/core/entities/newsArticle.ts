import type { PersistedEntity } from "./persistedEntity";

export type NewsArticleEntity = PersistedEntity & {
  stockId: string | null;
  url: string;
  title: string | null;
  content: string | null;
  publishedDate: Date | null;
};

export type NewNewsArticle = {
  url: string;
  stockId?: string | null;
  title?: string | null;
  content?: string | null;
  publishedDate?: Date | null;
};

export type NewsArticleContent = {
  title: string | null;
  content: string;
  publishedDate: Date;
};
