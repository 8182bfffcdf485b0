import type { Model, ModelStatic } from "sequelize";

/**
 * Static model type for a `sequelize.define` model with attributes `T`.
 * `TCreation` lists what `create` takes; generated columns and defaults stay out of it.
 */
export type ModelDef<T extends object, TCreation extends object = T> = ModelStatic<T & Model<T, TCreation>>;
