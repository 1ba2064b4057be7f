import { z } from 'zod';

export const NavSectionSchema = z
  .object({
    title: z.string().min(1).describe('Heading shown in the site navigation'),
    dir: z.string().min(1).describe('Directory under the docs dir whose articles fill the section'),
  })
  .strict();

/** Shape of the optional `docshelf.yml` at the site root. Every field is optional. */
export const SiteConfigFileSchema = z
  .object({
    docsDir: z.string().min(1).optional(),
    draftsDir: z.string().min(1).optional(),
    mkdocsFile: z.string().min(1).optional(),
    homePage: z.string().min(1).optional(),
    aboutPage: z.string().min(1).optional(),
    reservedPages: z.array(z.string().min(1)).optional(),
    sections: z.array(NavSectionSchema).optional(),
  })
  .strict();

export type NavSectionInput = z.infer<typeof NavSectionSchema>;
export type SiteConfigFile = z.infer<typeof SiteConfigFileSchema>;
