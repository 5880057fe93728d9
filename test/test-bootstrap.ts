import "../globals";
import { injector } from "../yok";

global.$injector = injector;

// Prints the stack of errors thrown outside of the tests.
import errors = require("../errors");
errors.installUncaughtExceptionListener();
