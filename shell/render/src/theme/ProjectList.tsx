import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import type { ResolvedItem } from "@folio/collections";
import { getString, getStringList } from "@folio/content";
import type { SiteConfig } from "@folio/config";
import type { SiteModel } from "../types";
import { siteHref } from "./links";

interface ProjectCardProps {
  project: ResolvedItem;
  config: SiteConfig;
  linked: boolean;
}

function ProjectCard({ project, config, linked }: ProjectCardProps): JSX.Element {
  const title = getString(project.frontMatter, "title") ?? project.slug;
  const description = getString(project.frontMatter, "description");
  const image = getString(project.frontMatter, "image");
  const external = getString(project.frontMatter, "external_url");
  const tools = getStringList(project.frontMatter, "tools");
  const href = external ?? (linked ? siteHref(config, project.url) : undefined);

  return (
    <li className="project-card">
      {image && (
        <img className="project-image" src={siteHref(config, image)} alt={title} />
      )}
      <h3 className="project-title">
        {href ? <a href={href}>{title}</a> : title}
      </h3>
      {description && <p className="project-description">{description}</p>}
      {tools.length > 0 && (
        <ul className="project-tools">
          {tools.map((tool) => (
            <li key={tool}>{tool}</li>
          ))}
        </ul>
      )}
    </li>
  );
}

/**
 * `{% include projects.html %}`: cards for the `projects` collection,
 * or the collection named by a `collection` parameter
 */
export function renderProjectList(
  site: SiteModel,
  params: Record<string, unknown>,
): string {
  const name =
    typeof params["collection"] === "string" ? params["collection"] : "projects";
  const collection = site.collections.get(name);
  if (!collection || collection.items.length === 0) {
    return "";
  }

  return render(
    <ul className="projects">
      {collection.items.map((project) => (
        <ProjectCard
          key={project.relativePath}
          project={project}
          config={site.config}
          linked={collection.output}
        />
      ))}
    </ul>,
  );
}
