import {BuildRenderError, DuplicateTargetError, UnresolvedPinError, ValidationError} from '../errors.js'
import type {BuildDefinition, BuildSelector, LockedBase, LockedBuild, LockedFeature, MatrixBuildDefinition} from '../types.js'
import {type TemplateContext, type TemplateEngine, type TemplateNode, list, object, scalar} from './template.js'
import {versionContext} from './version-resolver.js'

/**
 * Resolved bases and features by name, one entry per declared placeholder,
 * each list in declaration order.
 */
export type Catalog = {
  bases: Map<string, LockedBase[]>;
  features: Map<string, LockedFeature[]>;
  /** Position of each feature name in the config, used to order install steps. */
  featureOrder: Map<string, number>;
}

export function createCatalog(bases: LockedBase[], features: LockedFeature[]): Catalog {
  const catalog: Catalog = {bases: new Map(), features: new Map(), featureOrder: new Map()}
  for (const base of bases) {
    catalog.bases.set(base.name, [...(catalog.bases.get(base.name) ?? []), base])
  }

  for (const feature of features) {
    catalog.features.set(feature.name, [...(catalog.features.get(feature.name) ?? []), feature])
    if (!catalog.featureOrder.has(feature.name)) {
      catalog.featureOrder.set(feature.name, catalog.featureOrder.size)
    }
  }

  return catalog
}

/** Cartesian product; a product of no groups is one empty tuple. */
export function cartesian<T>(groups: T[][]): T[][] {
  let tuples: T[][] = [[]]
  for (const group of groups) {
    tuples = tuples.flatMap(tuple => group.map(item => [...tuple, item]))
  }

  return tuples
}

function select<T extends {name: string; placeholder: string}>(
  selector: BuildSelector,
  pool: Map<string, T[]>,
  kind: 'base' | 'feature'
): T[] {
  const entries = pool.get(selector.name)
  if (!entries) {
    throw new ValidationError(`Build references unknown ${kind} "${selector.name}"`)
  }

  if (!selector.versions) {
    return entries
  }

  return selector.versions.map(version => {
    const entry = entries.find(candidate => candidate.placeholder === version)
    if (!entry) {
      throw new UnresolvedPinError(`${kind} ${selector.name}`, version)
    }

    return entry
  })
}

/** Pinned builds are single-element matrices narrowed to the demanded placeholders. */
function asMatrix(build: BuildDefinition): MatrixBuildDefinition {
  if (build.kind === 'matrix') {
    return build
  }

  return {
    kind: 'matrix',
    bases: [{name: build.base.name, versions: [build.base.version]}],
    features: build.features.map(pin => [{name: pin.name, versions: [pin.version]}]),
    imageName: build.imageName,
    imageTag: build.imageTag
  }
}

/**
 * Context for image name and tag templates: `base.*` for the selected base,
 * and every selected base or feature under its own name.
 */
export function buildContext(base: LockedBase, features: LockedFeature[]): TemplateContext {
  const fields: Record<string, TemplateNode> = {}
  for (const feature of features) {
    fields[feature.name] = versionContext(feature.version, {tag: feature.tag})
  }

  fields[base.name] = versionContext(base.version, {tag: base.tag})
  fields.base = object({
    name: scalar(base.name),
    version: scalar(base.version),
    versions: list(base.versions.map(field => scalar(field))),
    tag: scalar(base.tag)
  })

  return object(fields)
}

export function targetName(base: LockedBase, features: LockedFeature[]): string {
  return [base.tag, ...features.map(feature => feature.tag)]
    .filter(tag => tag.length > 0)
    .join('-')
}

function identity(build: LockedBuild): string {
  return [build.base, ...build.features].map(ref => `${ref.name}@${ref.version}`).join(' ')
}

/** Fails when two distinct locked bases would name the same stage. */
export function assertUniqueBaseTags(bases: LockedBase[]): void {
  const seen = new Map<string, LockedBase>()
  for (const base of bases) {
    const existing = seen.get(base.tag)
    if (existing && (existing.name !== base.name || existing.version !== base.version)) {
      throw new DuplicateTargetError(base.tag, `bases ${existing.name}@${existing.version} and ${base.name}@${base.version} share the tag`)
    }

    seen.set(base.tag, base)
  }
}

/**
 * Expands every build definition into concrete builds.
 *
 * Per matrix build: each selected base × each of its versions × one
 * (feature, version) from every group. Targets are checked across all
 * builds before anything is returned; an exact repeat of a build is dropped.
 */
export function expandBuilds(builds: BuildDefinition[], catalog: Catalog, engine: TemplateEngine): LockedBuild[] {
  const baseTags = new Set([...catalog.bases.values()].flat().map(base => base.tag))
  const accepted = new Map<string, LockedBuild>()

  for (const [index, definition] of builds.entries()) {
    const build = asMatrix(definition)
    const bases = build.bases.flatMap(selector => select(selector, catalog.bases, 'base'))
    const groups = build.features.map(group => group.flatMap(selector => select(selector, catalog.features, 'feature')))

    for (const base of bases) {
      for (const selection of cartesian(groups)) {
        const features = [...selection].sort((a, b) => (catalog.featureOrder.get(a.name) ?? 0) - (catalog.featureOrder.get(b.name) ?? 0))
        const refs = {
          base: {name: base.name, version: base.version},
          features: features.map(feature => ({name: feature.name, version: feature.version}))
        }
        const context = buildContext(base, features)
        let locked: LockedBuild
        try {
          locked = {
            target: targetName(base, features),
            imageName: engine.render(build.imageName, context),
            imageTag: engine.render(build.imageTag, context),
            ...refs
          }
        } catch (error) {
          throw new BuildRenderError(`build #${index + 1} (${[refs.base, ...refs.features].map(ref => `${ref.name}@${ref.version}`).join(' ')})`, error)
        }

        if (locked.target.length === 0) {
          throw new ValidationError(`Build of base ${base.name}@${base.version} renders an empty target; give the base a version-tag`)
        }

        if (features.length > 0 && baseTags.has(locked.target)) {
          throw new DuplicateTargetError(locked.target, `build ${identity(locked)} collides with a base stage`)
        }

        const existing = accepted.get(locked.target)
        if (existing) {
          if (identity(existing) === identity(locked) && existing.imageName === locked.imageName && existing.imageTag === locked.imageTag) {
            continue
          }

          throw new DuplicateTargetError(locked.target, `builds ${identity(existing)} and ${identity(locked)} render the same target`)
        }

        accepted.set(locked.target, locked)
      }
    }
  }

  return [...accepted.values()]
}
