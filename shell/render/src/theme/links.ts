import type { SiteConfig, SocialNetwork } from "@folio/config";
import { SOCIAL_NETWORKS } from "@folio/config";
import { relativeUrl } from "../template/filters";

const PROFILE_URLS = {
  github: "https://github.com/{}",
  gitlab: "https://gitlab.com/{}",
  linkedin: "https://www.linkedin.com/in/{}",
  twitter: "https://twitter.com/{}",
  medium: "https://medium.com/@{}",
  stackoverflow: "https://stackoverflow.com/users/{}",
  kaggle: "https://www.kaggle.com/{}",
  behance: "https://www.behance.net/{}",
  dribbble: "https://dribbble.com/{}",
  facebook: "https://www.facebook.com/{}",
  instagram: "https://www.instagram.com/{}",
  soundcloud: "https://soundcloud.com/{}",
  spotify: "https://open.spotify.com/user/{}",
  tumblr: "https://{}",
  twitch: "https://www.twitch.tv/{}",
  vimeo: "https://vimeo.com/{}",
  youtube: "https://www.youtube.com/{}",
  keybase: "https://keybase.io/{}",
} satisfies Record<SocialNetwork, string>;

export interface SocialLink {
  network: SocialNetwork | "email" | "website" | "mobile";
  label: string;
  href: string;
}

/**
 * Link to a path inside the site, honouring baseurl
 */
export function siteHref(config: SiteConfig, path: string): string {
  return relativeUrl(path, config.baseurl);
}

/**
 * Author contact and profile links in display order
 */
export function authorLinks(config: SiteConfig): SocialLink[] {
  const author = config.author;
  const links: SocialLink[] = [];

  if (author.email) {
    links.push({ network: "email", label: author.email, href: `mailto:${author.email}` });
  }
  if (author.mobile) {
    links.push({
      network: "mobile",
      label: author.mobile,
      href: `tel:${author.mobile.replace(/[^\d+]/g, "")}`,
    });
  }
  if (author.website) {
    links.push({ network: "website", label: author.website, href: author.website });
  }

  for (const network of SOCIAL_NETWORKS) {
    const handle = author[network];
    if (typeof handle === "string" && handle.length > 0) {
      links.push({
        network,
        label: handle,
        href: PROFILE_URLS[network].replace("{}", handle),
      });
    }
  }

  return links;
}
