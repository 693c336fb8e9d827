import type { JSX } from "preact";
import type { SocialLink } from "./links";

export interface SocialLinksProps {
  links: SocialLink[];
  openNewTab?: boolean;
}

export function SocialLinks({
  links,
  openNewTab = false,
}: SocialLinksProps): JSX.Element | null {
  if (links.length === 0) return null;

  const external = openNewTab
    ? { target: "_blank", rel: "noopener noreferrer" }
    : {};

  return (
    <ul className="social-links">
      {links.map((link) => (
        <li key={link.network} className={`social-${link.network}`}>
          <a
            href={link.href}
            title={link.network}
            {...(link.href.startsWith("http") ? external : {})}
          >
            {link.label}
          </a>
        </li>
      ))}
    </ul>
  );
}
