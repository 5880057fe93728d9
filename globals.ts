import lodash from "lodash";

// Has to be imported before anything that uses `_` while loading.
Object.assign(global, { _: lodash });
