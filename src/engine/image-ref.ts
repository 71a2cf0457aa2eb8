/**
 * Repository part of an image reference: the reference without its tag or
 * digest. A registry port (`host:5000/app:1`) is not mistaken for a tag.
 */
export function imageRepository(image: string): string {
  const withoutDigest = image.split('@')[0]
  const slash = withoutDigest.lastIndexOf('/')
  const colon = withoutDigest.lastIndexOf(':')
  return colon > slash ? withoutDigest.slice(0, colon) : withoutDigest
}

/** Tag of an image reference, or undefined when it has none. */
export function imageTag(image: string): string | undefined {
  const withoutDigest = image.split('@')[0]
  const slash = withoutDigest.lastIndexOf('/')
  const colon = withoutDigest.lastIndexOf(':')
  return colon > slash ? withoutDigest.slice(colon + 1) : undefined
}

/** `repo@digest` when a digest is known, the reference as written otherwise. */
export function pinnedReference(image: string, digest?: string): string {
  return digest ? `${imageRepository(image)}@${digest}` : image
}
