import type { ElfLayout, ElfProgramHeader, ElfSection } from '../elf/parseElf.js';
import { PT_LOAD, SHF_ALLOC, SHT_NOBITS } from '../elf/parseElf.js';
import { Segment } from '../memory/segment.js';
import type { ImageState } from './types.js';

function isLoadable(section: ElfSection): boolean {
  return (section.flags & SHF_ALLOC) !== 0 && section.type !== SHT_NOBITS && section.size > 0;
}

function sectionInSegment(section: ElfSection, segment: ElfProgramHeader): boolean {
  return (
    section.offset >= segment.offset &&
    section.offset + section.size <= segment.offset + segment.fileSize &&
    section.address >= segment.virtualAddress &&
    section.address + section.size <= segment.virtualAddress + segment.memorySize
  );
}

/**
 * Load the allocated sections of `elf` at their physical (load) addresses.
 *
 * A section inside a `PT_LOAD` segment lands at
 * `segment.physicalAddress + (section.address - segment.virtualAddress)`. The entry point becomes
 * the execution start address.
 */
export function readElf(image: ImageState, elf: ElfLayout, overwrite = true): void {
  image.executionStartAddress = elf.entry;

  for (const segment of elf.programHeaders) {
    if (segment.type !== PT_LOAD) continue;
    for (const section of elf.sections) {
      if (!isLoadable(section) || !sectionInSegment(section, segment)) continue;
      const address = segment.physicalAddress + (section.address - segment.virtualAddress);
      const min = address * image.wordSizeBytes;
      image.segments.add(
        new Segment(min, min + section.data.length, section.data, image.wordSizeBytes),
        overwrite,
      );
    }
  }
}
