import type { ValidateOptions } from '@einvoice-fr/contracts';
import type { XmlElement } from '@einvoice-fr/shared';
import { prepareDocument, type ValidationTarget } from '../target.js';
import { ANY_CONTENT, loadContentModel, type ContentModel, type ParticleRule } from './content-model.js';

function matches(element: XmlElement, particle: ParticleRule): boolean {
  return element.name === particle.name && element.namespace === particle.namespace;
}

function quoteList(names: readonly string[]): string {
  return names.map((name) => `'${name}'`).join(' or ');
}

/**
 * Walks a document tree against a content model. Each element's children are
 * matched greedily against the sequence of its type. A child that no
 * remaining slot accepts is reported as unexpected and skipped.
 */
class StructureChecker {
  readonly errors: string[] = [];

  constructor(private readonly model: ContentModel) {}

  checkRoot(root: XmlElement): void {
    const rule = this.model.roots.find((candidate) => candidate.name === root.name && candidate.namespace === root.namespace);
    if (rule) {
      this.checkSequence(root, rule.type);
      return;
    }

    if (this.model.roots.some((candidate) => candidate.name === root.name)) {
      this.errors.push(`Unexpected namespace '${root.namespace ?? ''}' for root element '${root.name}'`);
    } else {
      this.errors.push(`Unexpected root element '${root.name}', expected ${quoteList(this.model.roots.map((r) => r.name))}`);
    }
  }

  private checkSequence(parent: XmlElement, typeName: string): void {
    const particles = this.model.types.get(typeName) ?? [];
    const children = parent.children;
    let index = 0;

    particles.forEach((particle, position) => {
      const remaining = particles.slice(position);
      let count = 0;
      for (;;) {
        const child = children[index];
        if (child === undefined) break;
        if (count < particle.max && matches(child, particle)) {
          this.checkElement(child, particle, parent);
          count += 1;
        } else if (!remaining.some((candidate) => matches(child, candidate))) {
          // Nothing at or after this slot can take it
          this.unexpected(child, parent);
        } else {
          break;
        }
        index += 1;
      }
      if (count < particle.min) {
        this.errors.push(`Missing required element '${particle.name}' in '${parent.name}'`);
      }
    });

    for (const child of children.slice(index)) {
      this.unexpected(child, parent);
    }
  }

  private unexpected(child: XmlElement, parent: XmlElement): void {
    this.errors.push(`Unexpected element '${child.name}' in '${parent.name}'`);
  }

  private checkElement(element: XmlElement, particle: ParticleRule, parent: XmlElement): void {
    for (const attribute of particle.attributes) {
      if (element.attributes[attribute] === undefined) {
        this.errors.push(`Missing required attribute '${attribute}' on '${element.name}' in '${parent.name}'`);
      }
    }

    if (particle.type === ANY_CONTENT) return;
    if (particle.type !== undefined) {
      this.checkSequence(element, particle.type);
      return;
    }

    const nested = element.children[0];
    if (nested !== undefined) {
      this.errors.push(`Unexpected element '${nested.name}' in '${element.name}'`);
    } else if (particle.pattern !== undefined && !particle.pattern.test(element.text)) {
      this.errors.push(`Invalid value '${element.text}' for '${element.name}' in '${parent.name}'`);
    }
  }
}

export function checkStructure(root: XmlElement, target: ValidationTarget): string[] {
  const checker = new StructureChecker(loadContentModel(target.syntax, target.profile));
  checker.checkRoot(root);
  return checker.errors;
}

/**
 * Checks the document tree against the content model of its syntax and
 * profile: root element and namespace, required elements, cardinality,
 * sequence order, required attributes and value shapes.
 *
 * @returns unprefixed messages in document order; empty when the document conforms
 * @throws ConfigurationError on an unknown flavor or profile
 */
export function validateStructure(xml: string | Uint8Array, options: ValidateOptions = {}): string[] {
  const prepared = prepareDocument(xml, options);
  if (!prepared.ok) {
    return prepared.errors;
  }
  return checkStructure(prepared.root, prepared.target);
}
