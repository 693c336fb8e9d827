import type { JSX } from "preact";
import { SocialLinks } from "./SocialLinks";
import type { SocialLink } from "./links";

export interface SiteFooterProps {
  authorName?: string | undefined;
  year: number;
  links: SocialLink[];
  openNewTab: boolean;
}

export function SiteFooter({
  authorName,
  year,
  links,
  openNewTab,
}: SiteFooterProps): JSX.Element {
  return (
    <footer className="site-footer">
      <SocialLinks links={links} openNewTab={openNewTab} />
      {authorName && (
        <p className="copyright">
          © {year} {authorName}
        </p>
      )}
    </footer>
  );
}
