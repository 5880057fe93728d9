export interface IAnnotation {
	args: string[];
	name: string;
}

export type Injectable = Function & { $inject?: IAnnotation };

export function getErrorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function isNullOrWhitespace(input: unknown): boolean {
	if (!input && input !== false) {
		return true;
	}

	return _.isString(input) && input.replace(/\s/gi, "").length < 1;
}

/**
 * Removes the first occurrence of the element from the array.
 * @returns {boolean} true if the element was found and removed.
 */
export function removeFirst<T>(array: T[], element: T): boolean {
	const index = array.indexOf(element);
	if (index === -1) {
		return false;
	}

	array.splice(index, 1);
	return true;
}

//--- begin part copied from AngularJS

//The MIT License
//
//Copyright (c) 2010-2012 Google, Inc. http://angularjs.org
//
//Permission is hereby granted, free of charge, to any person obtaining a copy
//of this software and associated documentation files (the "Software"), to deal
//in the Software without restriction, including without limitation the rights
//to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
//copies of the Software, and to permit persons to whom the Software is
//furnished to do so, subject to the following conditions:
//
//	The above copyright notice and this permission notice shall be included in
//all copies or substantial portions of the Software.
//
//	THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
//IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
//	FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
//AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
//LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
//	OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN
//THE SOFTWARE.

const CLASS_NAME = /class\s+([A-Z].+?)(?:\s+.*?)?\{/;
const CONSTRUCTOR_ARGS = /constructor\s*([^\(]*)\(\s*([^\)]*)\)/m;
const FN_NAME_AND_ARGS = /^(?:function)?\s*([^\(]*)\(\s*([^\)]*)\)\s*(=>)?\s*[{_]/m;
const FN_ARG_SPLIT = /,/;
const FN_ARG = /^\s*(_?)(\S+?)\1\s*$/;
const STRIP_COMMENTS = /((\/\/.*$)|(\/\*[\s\S]*?\*\/))/mg;

export function annotate(fn: Injectable): IAnnotation {
	let $inject = fn.$inject;

	if (!$inject || $inject.name !== fn.name) {
		const annotation: IAnnotation = { args: [], name: "" };
		const fnText = fn.toString().replace(STRIP_COMMENTS, '');

		let argDecl: RegExpMatchArray | null;
		let nameMatch = fnText.match(CLASS_NAME);

		if (nameMatch) {
			argDecl = fnText.match(CONSTRUCTOR_ARGS);
		} else {
			nameMatch = argDecl = fnText.match(FN_NAME_AND_ARGS);
		}

		annotation.name = (nameMatch && nameMatch[1]) || fn.name;

		if (argDecl && fnText.length) {
			argDecl[2].split(FN_ARG_SPLIT).forEach((arg) => {
				arg.replace(FN_ARG, (all: string, underscore: string, name: string) => {
					annotation.args.push(name);
					return all;
				});
			});
		}

		fn.$inject = $inject = annotation;
	}

	return $inject;
}

//--- end part copied from AngularJS
