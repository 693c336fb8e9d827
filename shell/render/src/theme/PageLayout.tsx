import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import { getString, getStringList } from "@folio/content";
import { pageTitle, type LayoutProps } from "./layout-props";

function PageLayoutBody({ page, content }: LayoutProps): JSX.Element {
  const title = pageTitle(page);
  const description = getString(page.frontMatter, "description");
  const tools = getStringList(page.frontMatter, "tools");

  return (
    <article className="page">
      {title && <h1 className="page-title">{title}</h1>}
      {description && <p className="page-description">{description}</p>}
      {tools.length > 0 && (
        <ul className="page-tools">
          {tools.map((tool) => (
            <li key={tool}>{tool}</li>
          ))}
        </ul>
      )}
      <div
        className="page-body"
        dangerouslySetInnerHTML={{ __html: content }}
      />
    </article>
  );
}

export function renderPageLayout(props: LayoutProps): string {
  return render(<PageLayoutBody {...props} />);
}
