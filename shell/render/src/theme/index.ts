import { render } from "preact-render-to-string";
import { h } from "preact";
import type { SiteModel } from "../types";
import { renderDefaultLayout } from "./DefaultLayout";
import { renderPageLayout } from "./PageLayout";
import { renderPostLayout } from "./PostLayout";
import { renderProjectList } from "./ProjectList";
import { renderPostList } from "./PostList";
import { SocialLinks } from "./SocialLinks";
import { renderTagList } from "./TagList";
import { renderTimeline } from "./Timeline";
import { authorLinks } from "./links";
import type { LayoutProps } from "./layout-props";

export interface BuiltinLayout {
  /** Layout the output is passed to next */
  parent?: string;
  render: (props: LayoutProps) => string;
}

export type BuiltinInclude = (
  site: SiteModel,
  params: Record<string, unknown>,
) => string;

export const BUILTIN_LAYOUTS: Readonly<Record<string, BuiltinLayout>> = {
  default: { render: renderDefaultLayout },
  page: { parent: "default", render: renderPageLayout },
  post: { parent: "default", render: renderPostLayout },
};

export const BUILTIN_INCLUDES: Readonly<Record<string, BuiltinInclude>> = {
  timeline: renderTimeline,
  projects: renderProjectList,
  posts: renderPostList,
  tags: (site) => renderTagList(site),
  social: (site) =>
    render(
      h(SocialLinks, {
        links: authorLinks(site.config),
        openNewTab: site.config.open_new_tab,
      }),
    ),
};

export { authorLinks, siteHref, type SocialLink } from "./links";
export type { LayoutProps } from "./layout-props";
