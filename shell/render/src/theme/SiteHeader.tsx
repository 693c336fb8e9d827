import type { JSX } from "preact";
import type { NavigationItem } from "../types";

export interface SiteHeaderProps {
  title: string;
  homeHref: string;
  navigation: readonly NavigationItem[];
  currentUrl: string;
}

/**
 * Site title and navigation bar
 * Items arrive ordered; the current page is marked active.
 */
export function SiteHeader({
  title,
  homeHref,
  navigation,
  currentUrl,
}: SiteHeaderProps): JSX.Element {
  return (
    <header className="site-header">
      <a className="site-title" href={homeHref}>
        {title}
      </a>
      {navigation.length > 0 && (
        <nav className="site-nav">
          <ul>
            {navigation.map((item) => (
              <li
                key={item.href}
                className={item.href === currentUrl ? "active" : undefined}
              >
                <a href={item.href}>{item.label}</a>
              </li>
            ))}
          </ul>
        </nav>
      )}
    </header>
  );
}
