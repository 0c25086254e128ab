export {
  ProfileSchema,
  EducationSchema,
  ExperienceSchema,
  parseProfile,
  type Profile,
  type ProfileInput,
  type Education,
  type Experience,
} from './schema';
export {
  ATTRIBUTE_PATHS,
  SEMANTIC_TYPES,
  flattenProfile,
  isAttributePath,
  type AttributePath,
  type ProfileAttribute,
  type SemanticType,
} from './attributes';
