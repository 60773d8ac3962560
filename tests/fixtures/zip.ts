import archiver from 'archiver'

export interface ZipMember {
  name: string
  content: string | Buffer
}

/**
 * Build a ZIP file in memory, members in the given order
 */
export async function buildZip(members: ZipMember[]): Promise<Buffer> {
  const archive = archiver('zip', { zlib: { level: 9 } })
  const chunks: Buffer[] = []

  const done = new Promise<void>((resolve, reject) => {
    archive.on('end', () => resolve())
    archive.on('error', reject)
  })
  archive.on('data', (chunk: Buffer) => chunks.push(chunk))

  for (const member of members) {
    archive.append(member.content, { name: member.name })
  }

  await archive.finalize()
  await done
  return Buffer.concat(chunks)
}
